import { DateTime } from 'luxon';
import { MalformedInputError } from '../../../../domain/errors/MalformedInputError';

/**
 * GregorianDate value object
 * A calendar day in the proleptic Gregorian calendar, with no time of day and no zone.
 * Validity (month lengths, leap days) is checked through Luxon.
 */
export class GregorianDate {
  public readonly year: number;
  public readonly month: number;
  public readonly day: number;

  public constructor(year: number, month: number, day: number) {
    const parsed = DateTime.fromObject({ year, month, day }, { zone: 'UTC' });
    if (!Number.isInteger(year) || year < 1 || !parsed.isValid) {
      throw new MalformedInputError(
        `Invalid Gregorian date ${year}-${month}-${day}: ${parsed.invalidExplanation ?? 'year must be a positive integer'}`
      );
    }
    this.year = year;
    this.month = month;
    this.day = day;
  }

  public static of(year: number, month: number, day: number): GregorianDate {
    return new GregorianDate(year, month, day);
  }

  /**
   * Parses a YYYY-MM-DD string
   */
  public static fromISODate(value: string): GregorianDate {
    const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
    if (!match || !match[1] || !match[2] || !match[3]) {
      throw new MalformedInputError(`Date must be in YYYY-MM-DD format, got "${value}"`);
    }
    return new GregorianDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
  }

  /**
   * Builds the date from the calendar fields of a Luxon DateTime, in that DateTime's own zone
   */
  public static fromDateTime(dateTime: DateTime): GregorianDate {
    return new GregorianDate(dateTime.year, dateTime.month, dateTime.day);
  }

  /**
   * Midnight of this day in the given zone (defaults to the system zone)
   */
  public toDateTime(zone = 'system'): DateTime {
    return DateTime.fromObject({ year: this.year, month: this.month, day: this.day }, { zone });
  }

  /**
   * Returns the date in ISO format (YYYY-MM-DD)
   */
  public toISODate(): string {
    const yyyy = String(this.year).padStart(4, '0');
    const mm = String(this.month).padStart(2, '0');
    const dd = String(this.day).padStart(2, '0');
    return `${yyyy}-${mm}-${dd}`;
  }

  public toString(): string {
    return this.toISODate();
  }

  /**
   * Negative when this date is earlier than `other`, zero when equal, positive when later
   */
  public compare(other: GregorianDate): number {
    return this.year - other.year || this.month - other.month || this.day - other.day;
  }

  public equals(other: GregorianDate): boolean {
    return this.compare(other) === 0;
  }
}
