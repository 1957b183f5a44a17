import { DomainError } from './DomainError';

/**
 * Thrown when month text matches none of the known Hebrew month names.
 * The raw text is kept so the source spreadsheet cell can be located and fixed.
 */
export class UnknownMonthNameError extends DomainError {
  public readonly rawText: string;

  public constructor(rawText: string) {
    super(`Unknown Hebrew month name: "${rawText}"`);
    this.rawText = rawText;
  }
}
