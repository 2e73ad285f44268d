import { parentPort, workerData } from 'worker_threads';

import { loadSettings } from '../config/settings';
import { OperationCancelledError } from '../core/errors';
import { isRecord } from '../storage/json_file';
import { createSharedCancelFlag } from '../tasks/background_task';
import { runJob } from '../tasks/jobs';
import { parseJobRequest } from '../tasks/requests';
import type { TaskWorkerMessage } from './protocol';

function post(message: TaskWorkerMessage): void {
  parentPort?.postMessage(message);
}

function main(): void {
  try {
    const data: unknown = workerData;
    if (!isRecord(data) || !(data.cancelBuffer instanceof SharedArrayBuffer)) {
      throw new Error('Task worker started without a cancel buffer');
    }
    const request = parseJobRequest(data.request);
    const signal = createSharedCancelFlag(data.cancelBuffer);
    const result = runJob(request, loadSettings(), {
      signal,
      verbose: false,
      onProgress: (progress) => post({ type: 'progress', progress }),
    });
    post({ type: 'result', result });
  } catch (error) {
    post({
      type: 'error',
      error: error instanceof Error ? error.message : String(error),
      cancelled: error instanceof OperationCancelledError,
    });
  }
}

main();
