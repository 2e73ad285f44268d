import type { JobProgress, JobResult } from '../tasks/jobs';
import type { JobRequest } from '../tasks/requests';

export interface TaskWorkerData {
  request: JobRequest;
  /** Four-byte buffer behind a shared cancel flag. */
  cancelBuffer: SharedArrayBuffer;
}

export type TaskWorkerMessage =
  | { type: 'progress'; progress: JobProgress }
  | { type: 'result'; result: JobResult }
  | { type: 'error'; error: string; cancelled: boolean };
