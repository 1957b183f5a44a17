#!/usr/bin/env node
/**
 * Command-line entry point
 *
 * **Usage:**
 * - `hebrew-birthdays --test-conversion`
 * - `hebrew-birthdays --name "Dana Levi" --hebrew-day 'ט"ו' --hebrew-month שבט`
 * - `hebrew-birthdays --csv birthdays.csv --years 10`
 * - `hebrew-birthdays --config config.json`
 *
 * **Environment Variables** (a `.env` file in the working directory is loaded first):
 * - BIRTHDAYS_CONFIG_PATH: config file used when no source flag is given (default: config.json)
 * - BIRTHDAY_CSV_PATH: CSV export used when it is set and no source flag is given
 * - YEARS_AHEAD: number of years to plan (default: the config file's years_ahead, else 5)
 * - LOG_LEVEL: pino level for diagnostics on stderr
 */

import 'dotenv/config';
import { DateTime } from 'luxon';
import { HebcalCalendarProvider } from './modules/hebrew-calendar/adapters/HebcalCalendarProvider';
import { HebrewDateCodec } from './modules/hebrew-calendar/domain/services/HebrewDateCodec';
import { BirthdayOccurrenceFinder } from './modules/birthdays/domain/services/BirthdayOccurrenceFinder';
import { ImportBirthdayRecordsUseCase } from './modules/birthdays/application/use-cases/ImportBirthdayRecordsUseCase';
import { PlanBirthdayEventsUseCase } from './modules/birthdays/application/use-cases/PlanBirthdayEventsUseCase';
import { CsvBirthdaySource } from './modules/birthdays/adapters/csv/CsvBirthdaySource';
import { JsonConfigBirthdaySource } from './modules/birthdays/adapters/config/JsonConfigBirthdaySource';
import { BirthdayCli } from './adapters/primary/cli/BirthdayCli';
import { Env, loadEnv } from './shared/config/env';
import { DomainError } from './domain/errors/DomainError';
import { logger } from './shared/logger';

async function main(argv: string[]): Promise<number> {
  let env: Env;
  try {
    env = loadEnv();
  } catch (error) {
    if (error instanceof DomainError) {
      process.stderr.write(`Error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }

  // Dependency injection: provider → codec → services → use cases
  const codec = new HebrewDateCodec(new HebcalCalendarProvider());
  const cli = new BirthdayCli({
    codec,
    importUseCase: new ImportBirthdayRecordsUseCase(codec),
    planUseCase: new PlanBirthdayEventsUseCase(new BirthdayOccurrenceFinder(codec), codec),
    createCsvSource: (path) => new CsvBirthdaySource(path),
    createConfigSource: (path) => new JsonConfigBirthdaySource(path),
    env,
    currentYear: DateTime.now().year,
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
  });

  return cli.run(argv);
}

main(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.fatal({
      msg: 'Unexpected failure',
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = 1;
  });
