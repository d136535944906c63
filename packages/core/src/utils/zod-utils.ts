import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { z } from 'zod';

import { DecodeFailure } from '../errors/index.js';

/**
 * Validate an input against a Zod schema.
 * Issues are reported as a `malformed-payload` DecodeFailure whose context lists
 * each issue path and message.
 */
export function fromZod<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  description = 'payload'
): Result<z.output<TSchema>, DecodeFailure> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return ok(parsed.data);
  }

  const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
  const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
  return err(DecodeFailure.malformedPayload(`Invalid ${description}: ${summary}`, { additionalContext: { issues } }));
}

/**
 * JSON.parse without throwing
 */
export function parseJson(text: string): Result<unknown, DecodeFailure> {
  try {
    return ok(JSON.parse(text) as unknown);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(DecodeFailure.malformedPayload(`Invalid JSON: ${message}`));
  }
}
