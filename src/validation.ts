// =============================================================================
// PUBLISHING DESK — Request Validation Helpers
// =============================================================================

import { z } from 'zod';
import { ValidationError } from './types/errors';

/** Parse `input` with `schema`, or throw ValidationError naming the first issue. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ValidationError(`${where}${issue.message}`);
  }
  return result.data;
}

/** Largest value of a PostgreSQL INTEGER / SERIAL column */
export const MAX_ID = 2_147_483_647;

/** Route parameter holding a positive integer id */
export const idParam = z.coerce.number().int().positive().max(MAX_ID);

export function parseId(value: unknown, label = 'id'): number {
  const parsed = idParam.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${label}`);
  }
  return parsed.data;
}
