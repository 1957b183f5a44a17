/**
 * BirthdayRow - one birthday as read from a source, before any parsing
 *
 * @example
 * ```typescript
 * const row: BirthdayRow = {
 *   source: 'birthdays.csv row 2',
 *   name: 'Dana Levi',
 *   dayText: 'כ"ט',
 *   monthText: "אדר א'",
 *   yearText: 'תשס"ה',
 * };
 * ```
 */
export interface BirthdayRow {
  /** Where the row came from, used in failure summaries */
  source: string;

  name: string;

  /** Day of the month, gematria or digits */
  dayText: string;

  /** Month name, or a month number 1-13 */
  monthText: string;

  /** Hebrew year, gematria or digits; empty when unknown */
  yearText?: string;
}
