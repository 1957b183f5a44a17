import { readFile } from 'fs/promises';
import { IBirthdaySource } from '../../application/ports/IBirthdaySource';
import { BirthdayRow } from '../../application/types/BirthdayRow';
import {
  BirthdaysConfigFile,
  BirthdaysConfigFileSchema,
  ConfiguredBirthdaySchema,
} from '../../../../shared/validation/schemas';
import { parseWithSchema } from '../../../../shared/validation/parseWithSchema';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';

/**
 * Parses the text of a birthdays configuration file
 *
 * @throws InfrastructureError when the text is not JSON
 * @throws MalformedInputError when the top-level shape or the settings are invalid
 */
export function parseBirthdaysConfig(content: string, label: string): BirthdaysConfigFile {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InfrastructureError(`Invalid JSON in ${label}: ${reason}`, error);
  }
  return parseWithSchema(BirthdaysConfigFileSchema, json, label);
}

function fieldText(entry: unknown, key: string): string {
  if (typeof entry !== 'object' || entry === null || !(key in entry)) {
    return '';
  }
  const value: unknown = Reflect.get(entry, key);
  return value === null || value === undefined ? '' : String(value);
}

/**
 * Turns configured entries into rows for the importer.
 *
 * Entries hold numbers, which the text parser reads as digits. An entry with the
 * wrong shape still becomes a row (whatever fields it has, as text) so that the
 * importer reports it alongside the other per-record failures.
 */
export function configEntriesToRows(config: BirthdaysConfigFile, label: string): BirthdayRow[] {
  return config.hebrew_birthdays.map((entry, index) => {
    const source = `${label} entry ${index + 1}`;
    const parsed = ConfiguredBirthdaySchema.safeParse(entry);
    if (!parsed.success) {
      return {
        source,
        name: fieldText(entry, 'name'),
        dayText: fieldText(entry, 'hebrew_day'),
        monthText: fieldText(entry, 'hebrew_month'),
        yearText: fieldText(entry, 'hebrew_year'),
      };
    }
    const { name, hebrew_day, hebrew_month, hebrew_year } = parsed.data;
    return {
      source,
      name,
      dayText: String(hebrew_day),
      monthText: String(hebrew_month),
      yearText: hebrew_year ? String(hebrew_year) : '',
    };
  });
}

/**
 * IBirthdaySource reading the `hebrew_birthdays` list of the JSON configuration file
 */
export class JsonConfigBirthdaySource implements IBirthdaySource {
  private config: BirthdaysConfigFile | null = null;

  public constructor(private readonly filePath: string) {}

  public get description(): string {
    return this.filePath;
  }

  /**
   * Reads and validates the file once; later calls return the cached result
   *
   * @throws InfrastructureError when the file cannot be read or is not JSON
   * @throws MalformedInputError when the file content has the wrong shape
   */
  public async readConfig(): Promise<BirthdaysConfigFile> {
    if (!this.config) {
      let content: string;
      try {
        content = await readFile(this.filePath, 'utf-8');
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new InfrastructureError(`Cannot read ${this.filePath}: ${reason}`, error);
      }
      this.config = parseBirthdaysConfig(content, this.filePath);
    }
    return this.config;
  }

  public async load(): Promise<BirthdayRow[]> {
    return configEntriesToRows(await this.readConfig(), this.filePath);
  }
}
