import { ZodError, ZodTypeAny, z } from 'zod';
import { MalformedInputError } from '../../domain/errors/MalformedInputError';

/**
 * Parses `value` with a Zod schema, turning a ZodError into a MalformedInputError
 * whose message joins the issue messages and whose details are the issues
 */
export function parseWithSchema<TSchema extends ZodTypeAny>(
  schema: TSchema,
  value: unknown,
  context?: string
): z.output<TSchema> {
  try {
    return schema.parse(value);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new MalformedInputError(context ? `${context}: ${issues}` : issues, error.issues);
    }
    throw error;
  }
}
