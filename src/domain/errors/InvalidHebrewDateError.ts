import { DomainError } from './DomainError';

/**
 * Thrown when a day/month combination does not exist in the given Hebrew year
 * (e.g. Adar II in a common year, or the 30th of a 29-day month)
 */
export class InvalidHebrewDateError extends DomainError {
  public readonly year: number;
  public readonly month: number;
  public readonly day: number;

  public constructor(year: number, month: number, day: number, reason: string) {
    super(`Invalid Hebrew date ${day}/${month}/${year}: ${reason}`);
    this.year = year;
    this.month = month;
    this.day = day;
  }
}
