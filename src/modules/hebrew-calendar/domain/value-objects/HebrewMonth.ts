/**
 * HebrewMonth enum
 * Month numbering counts from Nisan, so Tishrei (the start of the year count) is 7
 * and the leap month Adar II is 13
 */
export enum HebrewMonth {
  NISAN = 1,
  IYYAR = 2,
  SIVAN = 3,
  TAMUZ = 4,
  AV = 5,
  ELUL = 6,
  TISHREI = 7,
  CHESHVAN = 8,
  KISLEV = 9,
  TEVET = 10,
  SHVAT = 11,
  ADAR_I = 12,
  ADAR_II = 13,
}

export const MIN_HEBREW_MONTH = HebrewMonth.NISAN;
export const MAX_HEBREW_MONTH = HebrewMonth.ADAR_II;

/**
 * Checks whether a number is a month number in the Nisan-based convention
 */
export function isHebrewMonth(value: number): value is HebrewMonth {
  return Number.isInteger(value) && value >= MIN_HEBREW_MONTH && value <= MAX_HEBREW_MONTH;
}
