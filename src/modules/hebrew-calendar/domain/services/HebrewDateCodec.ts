import { IHebrewCalendarProvider } from '../../application/ports/IHebrewCalendarProvider';
import { HebrewDate } from '../value-objects/HebrewDate';
import { GregorianDate } from '../value-objects/GregorianDate';

/**
 * Plain date fields, as they arrive from the command line or a config file
 */
export interface DateFields {
  year: number;
  month: number;
  day: number;
}

/**
 * HebrewDateCodec - converts between Hebrew and Gregorian dates
 *
 * A thin adapter over an injected IHebrewCalendarProvider. It accepts either value
 * objects or raw field triples; raw triples are range-checked on the way in
 * (MalformedInputError), while the existence of a date in its Hebrew year is left to
 * the provider (InvalidHebrewDateError).
 *
 * Round-trip property: toHebrew(toGregorian(d)) equals d for every valid d,
 * and toGregorian(toHebrew(g)) equals g for every Gregorian date g.
 *
 * @example
 * ```typescript
 * const codec = new HebrewDateCodec(new HebcalCalendarProvider());
 * codec.toGregorian({ year: 5785, month: 7, day: 1 }).toISODate(); // '2024-10-03'
 * ```
 */
export class HebrewDateCodec {
  public constructor(private readonly provider: IHebrewCalendarProvider) {}

  /**
   * @throws MalformedInputError if a field is outside its numeric range
   * @throws InvalidHebrewDateError if the day does not exist in that Hebrew year
   */
  public toGregorian(date: HebrewDate | DateFields): GregorianDate {
    const hebrewDate =
      date instanceof HebrewDate ? date : new HebrewDate(date.year, date.month, date.day);
    return this.provider.toGregorian(hebrewDate);
  }

  /**
   * @throws MalformedInputError if the fields do not form a real Gregorian date
   */
  public toHebrew(date: GregorianDate | DateFields): HebrewDate {
    const gregorianDate =
      date instanceof GregorianDate ? date : new GregorianDate(date.year, date.month, date.day);
    return this.provider.toHebrew(gregorianDate);
  }

  /**
   * Hebrew year in progress on 1 January of a Gregorian year
   */
  public hebrewYearAtStartOf(gregorianYear: number): number {
    return this.toHebrew(new GregorianDate(gregorianYear, 1, 1)).year;
  }
}
