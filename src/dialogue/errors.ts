/** Raised into pending tasks when the call ends underneath them. */
export class CallEndedError extends Error {
  public readonly reason: string;

  constructor(reason: string) {
    super(`call ended: ${reason}`);
    this.name = 'CallEndedError';
    this.reason = reason;
  }
}

export function isCallEnded(error: unknown): error is CallEndedError {
  return error instanceof CallEndedError;
}
