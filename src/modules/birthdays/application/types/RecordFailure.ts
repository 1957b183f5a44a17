import { DomainError } from '../../../../domain/errors/DomainError';
import { UnknownMonthNameError } from '../../../../domain/errors/UnknownMonthNameError';

/**
 * RecordFailure - why one birthday record was left out of a batch
 *
 * Batches carry on past a bad record; these entries are what the caller reports
 * so the source spreadsheet or config file can be fixed.
 */
export interface RecordFailure {
  /** Row or entry label, e.g. "birthdays.csv row 4" or "Dana Levi (15/1)" */
  source: string;

  /** Error class name, e.g. "UnknownMonthNameError" */
  errorName: string;

  message: string;

  /** Offending text when the failure was caused by an unreadable cell */
  rawText?: string;
}

/**
 * Builds a failure entry from a domain error raised while handling one record
 */
export function toRecordFailure(source: string, error: DomainError): RecordFailure {
  const failure: RecordFailure = {
    source,
    errorName: error.name,
    message: error.message,
  };
  if (error instanceof UnknownMonthNameError) {
    failure.rawText = error.rawText;
  }
  return failure;
}
