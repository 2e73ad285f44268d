export class NoLegalActionsError extends Error {
  constructor(state?: string) {
    super(
      state === undefined
        ? 'No legal action available'
        : `No legal action available in state ${state}`,
    );
    this.name = 'NoLegalActionsError';
  }
}

export class IllegalActionError extends Error {
  readonly action: number;
  readonly legalActions: readonly number[];

  constructor(action: number, legalActions: readonly number[]) {
    super(`Illegal action ${action}; legal actions: [${legalActions.join(', ')}]`);
    this.name = 'IllegalActionError';
    this.action = action;
    this.legalActions = legalActions;
  }
}

export class OperationCancelledError extends Error {
  constructor(operation: string) {
    super(`${operation} was cancelled`);
    this.name = 'OperationCancelledError';
  }
}

export class TrainerBusyError extends Error {
  constructor(phase: string) {
    super(`Trainer is already running (phase=${phase})`);
    this.name = 'TrainerBusyError';
  }
}

/** Anything exposing an `aborted` flag: an AbortSignal or a shared worker flag. */
export interface CancelSignal {
  readonly aborted: boolean;
}

export function throwIfCancelled(signal: CancelSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation);
  }
}
