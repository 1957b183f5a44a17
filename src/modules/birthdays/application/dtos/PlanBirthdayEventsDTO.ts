import { BirthdayRecord } from '../../domain/entities/BirthdayRecord';

/**
 * DTO for planning birthday events over a span of Gregorian years
 *
 * **Usage:**
 * - CLI single-birthday mode (one record)
 * - CSV and config-file batches
 */
export interface PlanBirthdayEventsDTO {
  records: BirthdayRecord[];

  /** First Gregorian year to plan */
  startYear: number;

  /** Number of consecutive Gregorian years, at least 1 */
  yearCount: number;
}
