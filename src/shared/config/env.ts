import { z } from 'zod';
import { parseWithSchema } from '../validation/parseWithSchema';

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  BIRTHDAYS_CONFIG_PATH: z.string().min(1).default('config.json'),
  BIRTHDAY_CSV_PATH: z.string().min(1).optional(),
  YEARS_AHEAD: z.coerce.number().int().positive('YEARS_AHEAD must be a positive integer').optional(),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Read and validate the environment variables the CLI uses
 *
 * Empty strings count as unset, so a `.env` line such as `BIRTHDAY_CSV_PATH=` keeps the default.
 * `dotenv` is loaded by the entry point before this runs.
 *
 * @throws MalformedInputError when a variable has an invalid value
 *
 * @example
 * const env = loadEnv({ YEARS_AHEAD: '10' });
 * // env.YEARS_AHEAD === 10, env.BIRTHDAYS_CONFIG_PATH === 'config.json'
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );
  return parseWithSchema(EnvSchema, present, 'environment');
}
