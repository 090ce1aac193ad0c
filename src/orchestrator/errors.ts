export class RunCancelledError extends Error {
  constructor(message = 'Run was cancelled') {
    super(message);
    this.name = 'RunCancelledError';
  }
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }
}
