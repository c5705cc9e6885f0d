import type { z, ZodError, ZodTypeAny } from 'zod';
import { ValidationError, type FieldIssue } from './errors.js';

export function toFieldIssues(error: ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/**
 * Parse input against a schema, raising ValidationError with one issue per bad field
 */
export function parseOrThrow<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  message: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, toFieldIssues(result.error));
  }
  return result.data;
}
