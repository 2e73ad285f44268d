import { CancelSignal, OperationCancelledError } from '../core/errors';

export type TaskState = 'idle' | 'running' | 'completed' | 'cancelled' | 'failed';

export interface TaskSnapshot<P, R> {
  readonly state: TaskState;
  readonly progress: P | null;
  readonly result: R | null;
  readonly error: string | null;
  readonly startedAt: string | null;
  readonly updatedAt: string | null;
}

export interface TaskContext<P> {
  readonly signal: AbortSignal;
  publish(progress: P): void;
}

export type TaskJob<P, R> = (context: TaskContext<P>) => Promise<R>;

function frozen<P, R>(snapshot: TaskSnapshot<P, R>): TaskSnapshot<P, R> {
  return Object.freeze(snapshot);
}

/**
 * Runs one job at a time. Readers only ever see frozen snapshots; every
 * change replaces the snapshot with a single assignment.
 */
export class BackgroundTask<P, R> {
  private snapshot: TaskSnapshot<P, R> = frozen<P, R>({
    state: 'idle',
    progress: null,
    result: null,
    error: null,
    startedAt: null,
    updatedAt: null,
  });
  private controller: AbortController | null = null;
  private completion: Promise<TaskSnapshot<P, R>> | null = null;

  isRunning(): boolean {
    return this.snapshot.state === 'running';
  }

  getSnapshot(): TaskSnapshot<P, R> {
    return this.snapshot;
  }

  private replace(update: Partial<TaskSnapshot<P, R>>): void {
    this.snapshot = frozen<P, R>({
      ...this.snapshot,
      ...update,
      updatedAt: new Date().toISOString(),
    });
  }

  /** Starts the job unless one is already running; false when it was. */
  start(job: TaskJob<P, R>): boolean {
    if (this.isRunning()) {
      return false;
    }
    const controller = new AbortController();
    this.controller = controller;
    const now = new Date().toISOString();
    this.snapshot = frozen<P, R>({
      state: 'running',
      progress: null,
      result: null,
      error: null,
      startedAt: now,
      updatedAt: now,
    });
    this.completion = this.execute(job, controller);
    return true;
  }

  private execute(
    job: TaskJob<P, R>,
    controller: AbortController,
  ): Promise<TaskSnapshot<P, R>> {
    const context: TaskContext<P> = {
      signal: controller.signal,
      publish: (progress) => {
        if (this.controller === controller) {
          Object.freeze(progress);
          this.replace({ progress });
        }
      },
    };
    return new Promise<R>((resolve) => resolve(job(context)))
      .then(
        (result) => {
          this.replace({ state: 'completed', result });
        },
        (error: unknown) => {
          const cancelled = error instanceof OperationCancelledError || controller.signal.aborted;
          this.replace({
            state: cancelled ? 'cancelled' : 'failed',
            error: error instanceof Error ? error.message : String(error),
          });
        },
      )
      .then(() => {
        this.controller = null;
        return this.snapshot;
      });
  }

  /** Requests cooperative cancellation; the job stops at its next check. */
  cancel(): boolean {
    if (!this.controller) {
      return false;
    }
    this.controller.abort();
    return true;
  }

  /** Resolves with the final snapshot of the current or last job. */
  whenDone(): Promise<TaskSnapshot<P, R>> {
    return this.completion ?? Promise.resolve(this.snapshot);
  }
}

export interface SharedCancelFlag extends CancelSignal {
  readonly buffer: SharedArrayBuffer;
  cancel(): void;
}

/** Cancellation flag visible across worker threads through shared memory. */
export function createSharedCancelFlag(buffer = new SharedArrayBuffer(4)): SharedCancelFlag {
  const view = new Int32Array(buffer);
  return {
    buffer,
    get aborted() {
      return Atomics.load(view, 0) === 1;
    },
    cancel() {
      Atomics.store(view, 0, 1);
    },
  };
}
