import { BirthdayRow } from '../types/BirthdayRow';

/**
 * Port for anything that yields raw birthday rows (spreadsheet export, config file)
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface IBirthdaySource {
  /**
   * Human-readable origin, e.g. the file path
   */
  readonly description: string;

  /**
   * Reads every row. Rows are returned unparsed; parsing failures are the importer's concern.
   *
   * @throws MalformedInputError when the source as a whole is unreadable
   */
  load(): Promise<BirthdayRow[]>;
}
