import { HebrewDateCodec } from '../../../hebrew-calendar/domain/services/HebrewDateCodec';
import {
  parseHebrewDate,
  parseHebrewMonthDay,
} from '../../../hebrew-calendar/domain/services/HebrewTextParser';
import { BirthdayRecord } from '../../domain/entities/BirthdayRecord';
import { BirthdayRow } from '../types/BirthdayRow';
import { RecordFailure, toRecordFailure } from '../types/RecordFailure';
import { BirthdayRowInput, BirthdayRowSchema } from '../../../../shared/validation/schemas';
import { parseWithSchema } from '../../../../shared/validation/parseWithSchema';
import { DomainError } from '../../../../domain/errors/DomainError';
import { logger } from '../../../../shared/logger';

export interface ImportBirthdaysResult {
  records: BirthdayRecord[];
  failures: RecordFailure[];
}

/**
 * Use Case: Turn raw birthday rows into BirthdayRecords
 *
 * Process, per row:
 * 1. Validate the row shape (BirthdayRowSchema)
 * 2. Parse day, month and (when present) year text
 * 3. Check that the birth date exists in its Hebrew year
 * 4. Build the BirthdayRecord
 *
 * A row failing any step is reported in `failures` and the batch continues.
 * Only errors outside the domain taxonomy abort the import.
 *
 * @example
 * ```typescript
 * const useCase = new ImportBirthdayRecordsUseCase(codec);
 * const { records, failures } = useCase.execute(await csvSource.load());
 * ```
 */
export class ImportBirthdayRecordsUseCase {
  public constructor(private readonly codec: HebrewDateCodec) {}

  public execute(rows: BirthdayRow[]): ImportBirthdaysResult {
    const records: BirthdayRecord[] = [];
    const failures: RecordFailure[] = [];

    for (const row of rows) {
      try {
        records.push(this.importRow(row));
      } catch (error) {
        if (!(error instanceof DomainError)) {
          throw error;
        }
        const failure = toRecordFailure(row.source, error);
        failures.push(failure);
        logger.warn({ msg: 'Skipping birthday row', ...failure });
      }
    }

    logger.info({ msg: 'Imported birthday rows', imported: records.length, failed: failures.length });

    return { records, failures };
  }

  private importRow(row: BirthdayRow): BirthdayRecord {
    const validated = this.validate(row);
    const yearText = validated.yearText?.trim() ?? '';

    if (yearText.length === 0) {
      const { month, day } = parseHebrewMonthDay(validated.dayText, validated.monthText);
      return new BirthdayRecord({ name: validated.name, hebrewMonth: month, hebrewDay: day });
    }

    const birthDate = parseHebrewDate(validated.dayText, validated.monthText, yearText);
    // Throws InvalidHebrewDateError for e.g. 30 Kislev in a year where Kislev is short
    this.codec.toGregorian(birthDate);

    return new BirthdayRecord({
      name: validated.name,
      hebrewMonth: birthDate.month,
      hebrewDay: birthDate.day,
      hebrewBirthYear: birthDate.year,
    });
  }

  private validate(row: BirthdayRow): BirthdayRowInput {
    return parseWithSchema(BirthdayRowSchema, row);
  }
}
