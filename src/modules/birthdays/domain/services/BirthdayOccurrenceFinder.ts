import { HebrewDateCodec } from '../../../hebrew-calendar/domain/services/HebrewDateCodec';
import { HebrewDate } from '../../../hebrew-calendar/domain/value-objects/HebrewDate';
import { GregorianDate } from '../../../hebrew-calendar/domain/value-objects/GregorianDate';
import { isHebrewMonth } from '../../../hebrew-calendar/domain/value-objects/HebrewMonth';
import { InvalidHebrewDateError } from '../../../../domain/errors/InvalidHebrewDateError';
import { MalformedInputError } from '../../../../domain/errors/MalformedInputError';
import { logger } from '../../../../shared/logger';

/**
 * BirthdayOccurrenceFinder - projects a recurring Hebrew (month, day) onto Gregorian years
 *
 * The Hebrew year turns over in the autumn, so inside Gregorian year Y a given Hebrew
 * (month, day) falls either in H, the Hebrew year in progress on 1 January of Y, or in H+1.
 * Both are tried in that order and the first one landing in Y is taken.
 *
 * **Skip policy:**
 * When the date does not exist in either candidate year (Adar II in a common year,
 * the 30th of a month that has 29 days that year) the year is left out of the result.
 * No neighbouring day is substituted.
 */
export class BirthdayOccurrenceFinder {
  public constructor(private readonly codec: HebrewDateCodec) {}

  /**
   * Finds the Gregorian date of the Hebrew (month, day) in each of `yearCount` Gregorian
   * years starting at `startGregorianYear`
   *
   * @returns At most one date per year, sorted ascending
   * @throws MalformedInputError if month is outside 1-13, day outside 1-30,
   *         or the year arguments are not positive integers
   */
  public findOccurrences(
    hebrewMonth: number,
    hebrewDay: number,
    startGregorianYear: number,
    yearCount: number
  ): GregorianDate[] {
    this.validate(hebrewMonth, hebrewDay, startGregorianYear, yearCount);

    const occurrences: GregorianDate[] = [];

    for (let offset = 0; offset < yearCount; offset++) {
      const gregorianYear = startGregorianYear + offset;
      const occurrence = this.findInYear(hebrewMonth, hebrewDay, gregorianYear);

      if (occurrence) {
        occurrences.push(occurrence);
      } else {
        logger.debug({
          msg: 'Hebrew date has no occurrence in Gregorian year',
          hebrewMonth,
          hebrewDay,
          gregorianYear,
        });
      }
    }

    return occurrences.sort((a, b) => a.compare(b));
  }

  private findInYear(hebrewMonth: number, hebrewDay: number, gregorianYear: number): GregorianDate | null {
    const hebrewYear = this.codec.hebrewYearAtStartOf(gregorianYear);

    for (const candidateYear of [hebrewYear, hebrewYear + 1]) {
      try {
        const candidate = this.codec.toGregorian(new HebrewDate(candidateYear, hebrewMonth, hebrewDay));
        if (candidate.year === gregorianYear) {
          return candidate;
        }
      } catch (error) {
        if (!(error instanceof InvalidHebrewDateError)) {
          throw error;
        }
      }
    }

    return null;
  }

  private validate(
    hebrewMonth: number,
    hebrewDay: number,
    startGregorianYear: number,
    yearCount: number
  ): void {
    if (!isHebrewMonth(hebrewMonth)) {
      throw new MalformedInputError(`Hebrew month must be an integer from 1 to 13, got ${hebrewMonth}`);
    }
    if (!Number.isInteger(hebrewDay) || hebrewDay < 1 || hebrewDay > 30) {
      throw new MalformedInputError(`Hebrew day must be an integer from 1 to 30, got ${hebrewDay}`);
    }
    if (!Number.isInteger(startGregorianYear) || startGregorianYear < 1) {
      throw new MalformedInputError(`Start year must be a positive integer, got ${startGregorianYear}`);
    }
    if (!Number.isInteger(yearCount) || yearCount < 1) {
      throw new MalformedInputError(`Year count must be a positive integer, got ${yearCount}`);
    }
  }
}
