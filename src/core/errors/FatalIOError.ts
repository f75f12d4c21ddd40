// Raised when the input table cannot be read or the output cannot be written.
// Anything else that goes wrong for a single word is degraded, not thrown.
export class FatalIOError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FatalIOError';
  }
}
