import type { z } from 'zod';
import { ValidationError } from '@/core/errors.js';

/**
 * Validate a response against an optional schema.
 * Without a schema the value passes through untyped, matching the caller's `T`.
 */
export function validateResponse<T>(
  value: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown> | undefined,
  target: string,
  method: string,
): T {
  if (!schema) {
    // Unvalidated responses are trusted as the caller's T, like any JSON body.
    return value as T;
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ');
    throw new ValidationError(
      `Response to "${method}" from service "${target}" failed validation: ${summary}`,
      { target, method, issues },
    );
  }
  return parsed.data;
}
