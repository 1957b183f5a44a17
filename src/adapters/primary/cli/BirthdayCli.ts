import { HebrewDateCodec } from '../../../modules/hebrew-calendar/domain/services/HebrewDateCodec';
import { HebrewDate } from '../../../modules/hebrew-calendar/domain/value-objects/HebrewDate';
import { ImportBirthdayRecordsUseCase } from '../../../modules/birthdays/application/use-cases/ImportBirthdayRecordsUseCase';
import { PlanBirthdayEventsUseCase } from '../../../modules/birthdays/application/use-cases/PlanBirthdayEventsUseCase';
import { IBirthdaySource } from '../../../modules/birthdays/application/ports/IBirthdaySource';
import { BirthdayRow } from '../../../modules/birthdays/application/types/BirthdayRow';
import { RecordFailure } from '../../../modules/birthdays/application/types/RecordFailure';
import { ConfigSettings } from '../../../shared/validation/schemas';
import { Env } from '../../../shared/config/env';
import { DomainError } from '../../../domain/errors/DomainError';
import { InfrastructureError } from '../../../domain/errors/InfrastructureError';
import { logger } from '../../../shared/logger';
import { CliArgs, CliCommand, USAGE, parseCliArgs } from './parseCliArgs';

/**
 * Hebrew dates printed by --test-conversion: Passover 5784, Rosh Hashanah and Yom Kippur 5785
 */
export const REFERENCE_CONVERSIONS: readonly HebrewDate[] = [
  new HebrewDate(5784, 1, 15),
  new HebrewDate(5785, 7, 1),
  new HebrewDate(5785, 7, 10),
];

const DEFAULT_YEARS_AHEAD = 5;

/**
 * Birthday source backed by the JSON configuration file, which also carries settings
 */
export interface IConfigBirthdaySource extends IBirthdaySource {
  readConfig(): Promise<{ settings: ConfigSettings }>;
}

export interface BirthdayCliDependencies {
  codec: HebrewDateCodec;
  importUseCase: ImportBirthdayRecordsUseCase;
  planUseCase: PlanBirthdayEventsUseCase;
  createCsvSource: (path: string) => IBirthdaySource;
  createConfigSource: (path: string) => IConfigBirthdaySource;
  env: Env;
  currentYear: number;
  out: (line: string) => void;
  err: (line: string) => void;
}

interface YearSettings {
  startYear: number;
  yearCount: number;
}

/**
 * BirthdayCli - the command-line front end
 *
 * Parses the arguments, loads birthday rows from the selected source, imports and
 * plans them, and prints one header per birthday with its Gregorian dates:
 *
 * ```
 * Dana Levi (15/11)
 *   2025-02-13
 *   2026-02-02
 * ```
 *
 * `run()` resolves to the process exit code: 0 on success, 1 when the arguments or
 * a source are invalid or any record failed.
 */
export class BirthdayCli {
  public constructor(private readonly deps: BirthdayCliDependencies) {}

  public async run(argv: string[]): Promise<number> {
    try {
      const args = parseCliArgs(argv);
      return await this.dispatch(args);
    } catch (error) {
      if (error instanceof DomainError || error instanceof InfrastructureError) {
        this.deps.err(`Error: ${error.message}`);
        return 1;
      }
      throw error;
    }
  }

  private async dispatch(args: CliArgs): Promise<number> {
    const { command } = args;
    switch (command.kind) {
      case 'help':
        this.deps.out(USAGE);
        return 0;
      case 'test-conversion':
        this.printReferenceConversions();
        return 0;
      case 'single':
        return this.planRows([this.singleRow(command)], this.yearSettings(args));
      case 'csv':
        return this.planCsv(command.path, args);
      case 'config': {
        const csvPath = this.deps.env.BIRTHDAY_CSV_PATH;
        if (command.path === undefined && csvPath !== undefined) {
          return this.planCsv(csvPath, args);
        }
        const source = this.deps.createConfigSource(command.path ?? this.deps.env.BIRTHDAYS_CONFIG_PATH);
        const { settings } = await source.readConfig();
        if (settings.log_level && !this.deps.env.LOG_LEVEL) {
          logger.level = settings.log_level;
        }
        return this.planRows(await source.load(), this.yearSettings(args, settings));
      }
    }
  }

  private async planCsv(path: string, args: CliArgs): Promise<number> {
    const source = this.deps.createCsvSource(path);
    return this.planRows(await source.load(), this.yearSettings(args));
  }

  private printReferenceConversions(): void {
    for (const hebrewDate of REFERENCE_CONVERSIONS) {
      const gregorian = this.deps.codec.toGregorian(hebrewDate);
      this.deps.out(`Hebrew ${hebrewDate.toString()} = Gregorian ${gregorian.toISODate()}`);
    }
  }

  private singleRow(command: Extract<CliCommand, { kind: 'single' }>): BirthdayRow {
    return {
      source: 'command line',
      name: command.name,
      dayText: command.dayText,
      monthText: command.monthText,
      yearText: command.yearText,
    };
  }

  /**
   * Flags win over the environment, which wins over the config file settings
   */
  private yearSettings(args: CliArgs, settings?: ConfigSettings): YearSettings {
    return {
      startYear: args.startYear ?? settings?.start_year ?? this.deps.currentYear,
      yearCount: args.years ?? this.deps.env.YEARS_AHEAD ?? settings?.years_ahead ?? DEFAULT_YEARS_AHEAD,
    };
  }

  private planRows(rows: BirthdayRow[], years: YearSettings): number {
    const { records, failures } = this.deps.importUseCase.execute(rows);
    const lastYear = years.startYear + years.yearCount - 1;
    this.deps.out(`Hebrew birthdays for ${years.startYear}-${lastYear}`);

    for (const record of records) {
      // one record per call keeps each header next to its own dates
      const plan = this.deps.planUseCase.execute({ records: [record], ...years });
      failures.push(...plan.failures);
      if (plan.failures.length > 0) {
        continue;
      }

      this.deps.out('');
      this.deps.out(record.toString());
      if (plan.events.length === 0) {
        this.deps.out('  (no occurrences)');
      }
      for (const event of plan.events) {
        this.deps.out(`  ${event.date.toISODate()}`);
      }
    }

    this.printFailures(failures);
    return failures.length > 0 ? 1 : 0;
  }

  private printFailures(failures: RecordFailure[]): void {
    if (failures.length === 0) {
      return;
    }
    this.deps.err('');
    this.deps.err(`${failures.length} record(s) failed:`);
    for (const failure of failures) {
      this.deps.err(`  ${failure.source}: ${failure.message}`);
    }
  }
}
