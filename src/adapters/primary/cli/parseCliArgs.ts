import { parseArgs } from 'util';
import { z } from 'zod';
import { parseWithSchema } from '../../../shared/validation/parseWithSchema';
import { MalformedInputError } from '../../../domain/errors/MalformedInputError';

/**
 * What the CLI was asked to do, decided from the flags in this order:
 * help, conversion check, a single birthday, a CSV export, the JSON config file
 */
export type CliCommand =
  | { kind: 'help' }
  | { kind: 'test-conversion' }
  | { kind: 'single'; name: string; dayText: string; monthText: string; yearText?: string }
  | { kind: 'csv'; path: string }
  | { kind: 'config'; path?: string };

export interface CliArgs {
  command: CliCommand;
  years?: number;
  startYear?: number;
}

export const USAGE = [
  'Usage: hebrew-birthdays [options]',
  '',
  'Options:',
  '  --test-conversion          Print reference Hebrew/Gregorian conversions',
  '  --name <name>              Plan a single birthday (with --hebrew-day and --hebrew-month)',
  '  --hebrew-day <day>         Day of the month, in gematria or digits',
  '  --hebrew-month <month>     Month name in Hebrew, or its number (1 = Nisan ... 13 = Adar II)',
  '  --hebrew-year <year>       Optional birth year, in gematria or digits',
  '  --csv <path>               Import birthdays from a CSV export (columns שם, יום, חודש, שנה)',
  '  --config <path>            Read birthdays from a JSON config file (default: config.json)',
  '  --years <count>            Number of Gregorian years to plan',
  '  --start-year <year>        First Gregorian year to plan (default: current year)',
  '  -h, --help                 Show this help',
].join('\n');

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const CliNumbersSchema = z.object({
  years: z.coerce.number().int('--years must be an integer').positive('--years must be positive').optional(),
  startYear: z.coerce
    .number()
    .int('--start-year must be an integer')
    .positive('--start-year must be positive')
    .optional(),
});

/**
 * parseArgs reports unknown options and missing values with ERR_PARSE_ARGS_* codes
 */
function isParseArgsError(error: unknown): error is Error & { code: string } {
  if (!(typeof error === 'object' && error !== null && 'code' in error && 'message' in error)) {
    return false;
  }
  return typeof error.code === 'string' && error.code.startsWith('ERR_PARSE_ARGS_') && typeof error.message === 'string';
}

function readFlags(argv: string[]): ReturnType<typeof parseFlags> {
  try {
    return parseFlags(argv);
  } catch (error) {
    if (isParseArgsError(error)) {
      throw new MalformedInputError(error.message);
    }
    throw error;
  }
}

function parseFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      help: { type: 'boolean', short: 'h' },
      'test-conversion': { type: 'boolean' },
      name: { type: 'string' },
      'hebrew-day': { type: 'string' },
      'hebrew-month': { type: 'string' },
      'hebrew-year': { type: 'string' },
      csv: { type: 'string' },
      config: { type: 'string' },
      years: { type: 'string' },
      'start-year': { type: 'string' },
    },
  }).values;
}

/**
 * Parse command-line arguments (without the node and script entries)
 *
 * @throws MalformedInputError for unknown flags, missing values, bad numbers, or an
 *   incomplete single-birthday flag set
 *
 * @example
 * parseCliArgs(['--name', 'Dana', '--hebrew-day', 'ט"ו', '--hebrew-month', 'שבט', '--years', '3']);
 * // { command: { kind: 'single', name: 'Dana', dayText: 'ט"ו', monthText: 'שבט' }, years: 3 }
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const flags = readFlags(argv);
  const numbers = parseWithSchema(CliNumbersSchema, { years: flags.years, startYear: flags['start-year'] });
  return { command: selectCommand(flags), years: numbers.years, startYear: numbers.startYear };
}

function selectCommand(flags: ReturnType<typeof parseFlags>): CliCommand {
  if (flags.help) {
    return { kind: 'help' };
  }
  if (flags['test-conversion']) {
    return { kind: 'test-conversion' };
  }

  const name = flags.name;
  const dayText = flags['hebrew-day'];
  const monthText = flags['hebrew-month'];
  if (name !== undefined || dayText !== undefined || monthText !== undefined) {
    if (name === undefined || dayText === undefined || monthText === undefined) {
      throw new MalformedInputError('--name, --hebrew-day and --hebrew-month must be given together');
    }
    return { kind: 'single', name, dayText, monthText, yearText: flags['hebrew-year'] };
  }

  if (flags.csv !== undefined) {
    return { kind: 'csv', path: flags.csv };
  }
  return flags.config !== undefined ? { kind: 'config', path: flags.config } : { kind: 'config' };
}
