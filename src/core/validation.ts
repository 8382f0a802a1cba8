import type { z } from 'zod';
import { InvalidArgumentError } from './errors.js';

/**
 * Parse `input` with a zod schema, converting failures into an
 * InvalidArgumentError that lists every issue as `path: message`.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidArgumentError(
      `Invalid ${what}`,
      result.error.issues.map(formatIssue)
    );
  }
  return result.data;
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}
