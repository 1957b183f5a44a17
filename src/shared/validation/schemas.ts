import { z } from 'zod';

/**
 * Zod schema for a raw birthday row, whatever the source
 *
 * Validation Rules:
 * - source: required label used in failure summaries
 * - name: required, 1-100 characters after trimming
 * - dayText / monthText: required, non-blank
 * - yearText: optional, may be blank when the year is unknown
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const BirthdayRowSchema = z.object({
  source: z.string().min(1, 'Source is required'),
  name: z
    .string()
    .trim()
    .min(1, 'Name is required')
    .max(100, 'Name cannot exceed 100 characters'),
  dayText: z.string().trim().min(1, 'Day is required'),
  monthText: z.string().trim().min(1, 'Month is required'),
  yearText: z.string().optional(),
});

export type BirthdayRowInput = z.infer<typeof BirthdayRowSchema>;

/**
 * Zod schema for one entry of the JSON configuration file
 *
 * Field names follow the configuration file format (snake_case).
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const ConfiguredBirthdaySchema = z.object({
  name: z.string().trim().min(1, 'Name is required'),
  hebrew_day: z.number().int().min(1, 'hebrew_day must be 1-30').max(30, 'hebrew_day must be 1-30'),
  hebrew_month: z.number().int().min(1, 'hebrew_month must be 1-13').max(13, 'hebrew_month must be 1-13'),
  hebrew_year: z.number().int().positive().nullable().optional(),
});

/**
 * Zod schema for the `settings` block of the configuration file
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const ConfigSettingsSchema = z.object({
  years_ahead: z.number().int().positive().default(5),
  start_year: z.number().int().positive().nullable().default(null),
  log_level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

export type ConfigSettings = z.infer<typeof ConfigSettingsSchema>;

/**
 * Zod schema for the whole configuration file
 *
 * ```json
 * {
 *   "hebrew_birthdays": [{ "name": "Dana Levi", "hebrew_day": 15, "hebrew_month": 1 }],
 *   "settings": { "years_ahead": 5, "start_year": null }
 * }
 * ```
 *
 * Entries are kept as unknown here and validated one by one, so that one bad entry
 * does not reject the whole file.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const BirthdaysConfigFileSchema = z.object({
  hebrew_birthdays: z.array(z.unknown()).default([]),
  settings: ConfigSettingsSchema.default({}),
});

export type BirthdaysConfigFile = z.infer<typeof BirthdaysConfigFileSchema>;

/**
 * Zod schema for the span of years a plan covers
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const YearSpanSchema = z.object({
  startYear: z.number().int('Start year must be an integer').positive('Start year must be positive'),
  yearCount: z.number().int('Year count must be an integer').positive('Year count must be positive'),
});

export type YearSpan = z.infer<typeof YearSpanSchema>;
