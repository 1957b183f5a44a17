import { MalformedInputError } from '../../../../domain/errors/MalformedInputError';
import { isHebrewMonth } from './HebrewMonth';

/**
 * HebrewDate value object
 *
 * Holds a (year, month, day) triple in the Nisan-based month numbering.
 * Only the numeric ranges are checked here; whether the day exists in that
 * particular year is decided by HebrewDateCodec, which knows the calendar rules.
 */
export class HebrewDate {
  public readonly year: number;
  public readonly month: number;
  public readonly day: number;

  public constructor(year: number, month: number, day: number) {
    if (!Number.isInteger(year) || year < 1) {
      throw new MalformedInputError(`Hebrew year must be a positive integer, got ${year}`);
    }
    if (!isHebrewMonth(month)) {
      throw new MalformedInputError(`Hebrew month must be an integer from 1 to 13, got ${month}`);
    }
    if (!Number.isInteger(day) || day < 1 || day > 30) {
      throw new MalformedInputError(`Hebrew day must be an integer from 1 to 30, got ${day}`);
    }
    this.year = year;
    this.month = month;
    this.day = day;
  }

  public static of(year: number, month: number, day: number): HebrewDate {
    return new HebrewDate(year, month, day);
  }

  /**
   * Returns the date as "day/month/year"
   */
  public toString(): string {
    return `${this.day}/${this.month}/${this.year}`;
  }

  public equals(other: HebrewDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day;
  }
}
