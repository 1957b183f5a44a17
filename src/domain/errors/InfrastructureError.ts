/**
 * InfrastructureError
 *
 * Thrown when a birthday source cannot be read at all, including:
 * - Missing or unreadable files
 * - CSV or JSON that does not parse
 *
 * Unlike the domain errors, this aborts the whole batch: there are no records to
 * carry on with.
 */
export class InfrastructureError extends Error {
  public constructor(
    message: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'InfrastructureError';

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InfrastructureError);
    }
  }
}
