import { readFile } from 'fs/promises';
import { Options, parse } from 'csv-parse';
import { z } from 'zod';
import { IBirthdaySource } from '../../application/ports/IBirthdaySource';
import { BirthdayRow } from '../../application/types/BirthdayRow';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';

/**
 * Column headers of the birthdays spreadsheet export
 */
export const CSV_COLUMNS = {
  name: 'שם',
  day: 'יום',
  month: 'חודש',
  year: 'שנה',
} as const;

const REQUIRED_COLUMNS = [CSV_COLUMNS.name, CSV_COLUMNS.day, CSV_COLUMNS.month];

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const CsvRecordsSchema = z.array(
  z.object({
    record: z.record(z.string().optional()),
    info: z.object({ lines: z.number().int() }),
  })
);

/**
 * Parses a birthdays CSV export (header row, Hebrew column names, optional BOM)
 *
 * Row labels are the line number of the record in the file (the header is line 1), so
 * they match what a spreadsheet shows even when blank lines are skipped. A row with
 * missing cells is kept with those cells empty and left to the importer to report.
 *
 * @throws InfrastructureError when the text is not valid CSV or a required column is missing
 */
export function parseBirthdayCsv(content: string, label: string): Promise<BirthdayRow[]> {
  let header: string[] = [];
  const options: Options = {
    columns: (names: string[]) => {
      header = names;
      return names;
    },
    bom: true,
    info: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    trim: true,
  };

  return new Promise((resolve, reject) => {
    parse(content, options, (error, output: unknown) => {
      if (error) {
        reject(new InfrastructureError(`Cannot parse ${label}: ${error.message}`, error));
        return;
      }

      const records = CsvRecordsSchema.safeParse(output);
      if (!records.success) {
        reject(new InfrastructureError(`Cannot parse ${label}: unexpected CSV structure`, records.error));
        return;
      }

      const missing = header.length > 0 ? REQUIRED_COLUMNS.filter((column) => !header.includes(column)) : [];
      if (missing.length > 0) {
        reject(new InfrastructureError(`${label} is missing column(s): ${missing.join(', ')}`));
        return;
      }

      resolve(
        records.data.map(({ record, info }) => ({
          source: `${label} row ${info.lines}`,
          name: record[CSV_COLUMNS.name] ?? '',
          dayText: record[CSV_COLUMNS.day] ?? '',
          monthText: record[CSV_COLUMNS.month] ?? '',
          yearText: record[CSV_COLUMNS.year] ?? '',
        }))
      );
    });
  });
}

/**
 * IBirthdaySource reading the spreadsheet export from disk
 */
export class CsvBirthdaySource implements IBirthdaySource {
  public constructor(private readonly filePath: string) {}

  public get description(): string {
    return this.filePath;
  }

  public async load(): Promise<BirthdayRow[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InfrastructureError(`Cannot read ${this.filePath}: ${reason}`, error);
    }
    return parseBirthdayCsv(content, this.filePath);
  }
}
