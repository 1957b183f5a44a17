import { GEMATRIA_VALUES } from '../../config/gematria-values';
import { HEBREW_MONTH_NAMES } from '../../config/hebrew-month-names';
import { HebrewDate } from '../value-objects/HebrewDate';
import { HebrewMonth, isHebrewMonth } from '../value-objects/HebrewMonth';
import { UnknownMonthNameError } from '../../../../domain/errors/UnknownMonthNameError';
import { MalformedInputError } from '../../../../domain/errors/MalformedInputError';

/**
 * HebrewTextParser - reads Hebrew day/month/year text as it appears in spreadsheet cells
 *
 * Handles gematria numerals (כ"ט, תשפ״ה), year prefixes (שנת, ה'), the "ב" prefix on
 * month names (באדר ב'), and plain digits in any field.
 *
 * Gematria is a plain sum of letter values: ט"ו and ט"ז come out as 15 and 16 because
 * that is how they add up, and י"ה would also read as 15.
 */

/** Geresh, gershayim, straight/curly quotes and backticks */
const QUOTE_MARKS = /['"`‘’“”׳״]/g;
const DIGITS_ONLY = /^\d+$/;
const YEAR_PREFIX = 'שנת';
const MILLENNIUM_MARKER = 'ה';
const IN_PREFIX = 'ב';
const MAX_HEBREW_DAY = 30;

/**
 * Trims the text and strips every quote mark
 */
export function normalizeHebrewText(text: string): string {
  return text.trim().replace(QUOTE_MARKS, '');
}

function toMonthKey(text: string): string {
  return normalizeHebrewText(text).replace(/\s+/g, '');
}

const MONTHS_BY_KEY: ReadonlyMap<string, HebrewMonth> = new Map(
  HEBREW_MONTH_NAMES.map(([name, month]) => [toMonthKey(name), month])
);

/**
 * Sums the gematria values of the Hebrew letters in `text`, left to right.
 * Anything that is not a Hebrew numeral letter is ignored; returns 0 when no letter is recognised.
 */
export function gematriaToNumber(text: string): number {
  let total = 0;
  for (const ch of text) {
    total += GEMATRIA_VALUES.get(ch) ?? 0;
  }
  return total;
}

/**
 * Reads a Hebrew year such as תשפ"ה, ה'תשפ"ה or שנת התשס"ה.
 *
 * Years written without the thousands (the usual form) are placed in the 5000s.
 * Digits are accepted too ("5785", or "785" for 5785). Returns 0 when nothing in the
 * text can be read as a year.
 */
export function hebrewYearToNumber(text: string): number {
  let yearText = text.replaceAll(YEAR_PREFIX, '').trim();

  const digits = normalizeHebrewText(yearText);
  if (DIGITS_ONLY.test(digits)) {
    const value = parseInt(digits, 10);
    return value > 0 && value < 1000 ? value + 5000 : value;
  }

  if (yearText.startsWith(MILLENNIUM_MARKER) && yearText.length > 1) {
    yearText = yearText.slice(MILLENNIUM_MARKER.length);
  }

  const letters = [...yearText].filter((ch) => GEMATRIA_VALUES.has(ch)).join('');
  const value = gematriaToNumber(letters);
  if (value === 0) {
    return 0;
  }
  return value < 1000 ? value + 5000 : value;
}

/**
 * Maps a month name (with or without quote marks, spaces or a leading ב) to its month number.
 * Digits 1-13 are accepted as the month number itself.
 *
 * @throws UnknownMonthNameError carrying the raw text when nothing matches
 */
export function normalizeMonthName(text: string): HebrewMonth {
  const key = toMonthKey(text);

  if (DIGITS_ONLY.test(key)) {
    const value = parseInt(key, 10);
    if (isHebrewMonth(value)) {
      return value;
    }
    throw new UnknownMonthNameError(text);
  }

  const month = MONTHS_BY_KEY.get(key);
  if (month !== undefined) {
    return month;
  }

  if (key.startsWith(IN_PREFIX)) {
    const withoutPrefix = MONTHS_BY_KEY.get(key.slice(IN_PREFIX.length));
    if (withoutPrefix !== undefined) {
      return withoutPrefix;
    }
  }

  throw new UnknownMonthNameError(text);
}

/**
 * Reads a day of the month written in gematria (כ"ט) or digits (29)
 *
 * @throws MalformedInputError when the text holds no day or a day above 30
 */
export function parseHebrewDay(text: string): number {
  const normalized = normalizeHebrewText(text);
  const day = DIGITS_ONLY.test(normalized) ? parseInt(normalized, 10) : gematriaToNumber(normalized);

  if (day === 0) {
    throw new MalformedInputError(`Could not read a Hebrew day from "${text}"`, { field: 'day', text });
  }
  if (day > MAX_HEBREW_DAY) {
    throw new MalformedInputError(`Hebrew day must be at most ${MAX_HEBREW_DAY}, read ${day} from "${text}"`, {
      field: 'day',
      text,
    });
  }
  return day;
}

/**
 * Parses the day and month of a recurring date whose year is unknown
 */
export function parseHebrewMonthDay(
  dayText: string,
  monthText: string
): { month: HebrewMonth; day: number } {
  return {
    month: normalizeMonthName(monthText),
    day: parseHebrewDay(dayText),
  };
}

/**
 * Parses a full Hebrew date from its three text fields.
 *
 * @example
 * parseHebrewDate('כ"ט', "אדר א'", 'תשס"ה'); // HebrewDate { year: 5765, month: 12, day: 29 }
 *
 * @throws UnknownMonthNameError when the month text is not a known month
 * @throws MalformedInputError when the day or year cannot be read
 */
export function parseHebrewDate(dayText: string, monthText: string, yearText: string): HebrewDate {
  const { month, day } = parseHebrewMonthDay(dayText, monthText);

  const year = hebrewYearToNumber(normalizeHebrewText(yearText));
  if (year === 0) {
    throw new MalformedInputError(`Could not read a Hebrew year from "${yearText}"`, { field: 'year', text: yearText });
  }

  return new HebrewDate(year, month, day);
}
