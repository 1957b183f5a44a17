import { HebrewMonth } from '../domain/value-objects/HebrewMonth';

/**
 * Month names as they are written in spreadsheets, with their spelling variants.
 *
 * Keys are looked up after quote marks and whitespace are stripped from both sides,
 * so "אדר א'" and "אדר א" are the same entry. Plain "אדר" is month 12, which
 * @hebcal/core reads as Adar I in a leap year.
 */
export const HEBREW_MONTH_NAMES: ReadonlyArray<readonly [name: string, month: HebrewMonth]> = [
  ['תשרי', HebrewMonth.TISHREI],
  ['חשון', HebrewMonth.CHESHVAN],
  ['חשוון', HebrewMonth.CHESHVAN],
  ['מרחשון', HebrewMonth.CHESHVAN],
  ['מרחשוון', HebrewMonth.CHESHVAN],
  ['כסלו', HebrewMonth.KISLEV],
  ['כסליו', HebrewMonth.KISLEV],
  ['טבת', HebrewMonth.TEVET],
  ['שבט', HebrewMonth.SHVAT],
  ['אדר', HebrewMonth.ADAR_I],
  ['אדר א', HebrewMonth.ADAR_I],
  ["אדר א'", HebrewMonth.ADAR_I],
  ['אדר ראשון', HebrewMonth.ADAR_I],
  ['אדר ב', HebrewMonth.ADAR_II],
  ["אדר ב'", HebrewMonth.ADAR_II],
  ['אדר שני', HebrewMonth.ADAR_II],
  ['ניסן', HebrewMonth.NISAN],
  ['אייר', HebrewMonth.IYYAR],
  ['סיון', HebrewMonth.SIVAN],
  ['סיוון', HebrewMonth.SIVAN],
  ['תמוז', HebrewMonth.TAMUZ],
  ['אב', HebrewMonth.AV],
  ['מנחם אב', HebrewMonth.AV],
  ['אלול', HebrewMonth.ELUL],
];
