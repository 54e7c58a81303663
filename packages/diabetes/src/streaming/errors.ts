/**
 * Errors reported by the streaming buffers
 */

export class StreamError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StreamError";
  }
}

/**
 * The store committed fewer records than it was given.
 * The uncommitted records stay buffered.
 */
export class ShortWriteError extends StreamError {
  readonly written: number;
  readonly submitted: number;

  constructor(written: number, submitted: number) {
    super(`Short write: ${written} of ${submitted} records committed`);
    this.name = "ShortWriteError";
    this.written = written;
    this.submitted = submitted;
  }
}

/**
 * The store failed outright (connectivity, throttling, persistence fault)
 */
export class StoreFailureError extends StreamError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreFailureError";
  }
}

/**
 * The caller broke the buffer's input contract: empty or unordered input,
 * a bad timestamp, a write after close, or an invalid window duration.
 * Nothing from the offending call is accepted.
 */
export class ContractViolationError extends StreamError {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolationError";
  }
}
