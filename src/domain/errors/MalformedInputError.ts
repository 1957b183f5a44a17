import { DomainError } from './DomainError';

/**
 * Thrown when numeric arguments or text fields are out of range, empty or
 * otherwise unusable before any calendar computation takes place
 */
export class MalformedInputError extends DomainError {
  public readonly details?: unknown;

  public constructor(message: string, details?: unknown) {
    super(message);
    this.details = details;
  }
}
