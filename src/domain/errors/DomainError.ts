/**
 * Base class for every error raised by the calendar core.
 * Batch callers catch `DomainError` per record and keep going; anything else
 * is treated as a bug and propagates.
 */
export class DomainError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}
