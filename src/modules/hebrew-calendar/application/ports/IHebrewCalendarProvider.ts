import { HebrewDate } from '../../domain/value-objects/HebrewDate';
import { GregorianDate } from '../../domain/value-objects/GregorianDate';

/**
 * Port for the Hebrew-calendar computation.
 *
 * Leap years, month lengths and the molad arithmetic live behind this interface,
 * so the codec and the occurrence finder can be tested against a reference table
 * instead of a real calendar library.
 *
 * Note: The 'I' prefix for port interfaces follows the project's Hexagonal Architecture
 * naming.
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface IHebrewCalendarProvider {
  /**
   * Converts a Hebrew date to the Gregorian day it falls on (daytime part of the Hebrew day).
   *
   * @throws InvalidHebrewDateError if the month or day does not exist in that Hebrew year
   */
  toGregorian(date: HebrewDate): GregorianDate;

  /**
   * Converts a Gregorian day to the Hebrew date whose daytime falls on it.
   */
  toHebrew(date: GregorianDate): HebrewDate;
}
