import { HDate } from '@hebcal/core';
import { DateTime } from 'luxon';
import { IHebrewCalendarProvider } from '../application/ports/IHebrewCalendarProvider';
import { HebrewDate } from '../domain/value-objects/HebrewDate';
import { GregorianDate } from '../domain/value-objects/GregorianDate';
import { InvalidHebrewDateError } from '../../../domain/errors/InvalidHebrewDateError';

/**
 * HebcalCalendarProvider - IHebrewCalendarProvider backed by @hebcal/core
 *
 * @hebcal/core numbers months from Nisan exactly like HebrewDate does, so month
 * numbers pass through unchanged.
 *
 * HDate normalises out-of-range input instead of rejecting it (30 Cheshvan in a
 * short year silently becomes 1 Kislev), so existence is checked here against
 * HDate.monthsInYear / HDate.daysInMonth before converting.
 *
 * JS Dates cross the library boundary at local midnight; only their calendar
 * fields are read back, so the system zone never shifts the day.
 */
export class HebcalCalendarProvider implements IHebrewCalendarProvider {
  public toGregorian(date: HebrewDate): GregorianDate {
    const monthsInYear = HDate.monthsInYear(date.year);
    if (date.month > monthsInYear) {
      throw new InvalidHebrewDateError(
        date.year,
        date.month,
        date.day,
        `year ${date.year} has only ${monthsInYear} months`
      );
    }

    const daysInMonth = HDate.daysInMonth(date.month, date.year);
    if (date.day > daysInMonth) {
      throw new InvalidHebrewDateError(
        date.year,
        date.month,
        date.day,
        `month ${date.month} of ${date.year} has only ${daysInMonth} days`
      );
    }

    const greg = new HDate(date.day, date.month, date.year).greg();
    return GregorianDate.fromDateTime(DateTime.fromJSDate(greg));
  }

  public toHebrew(date: GregorianDate): HebrewDate {
    const hdate = new HDate(date.toDateTime().toJSDate());
    return new HebrewDate(hdate.getFullYear(), hdate.getMonth(), hdate.getDate());
  }
}
