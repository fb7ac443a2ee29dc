// src/routes/validate.ts
// What: zod parsing for request bodies and query strings.
// How: Runs safeParse and turns issues into one ValidationError, which the central handler renders as 400.

import type { z } from 'zod';
import { ValidationError } from '../errors.js';

export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => (e.path.length ? `${e.path.join('.')}: ${e.message}` : e.message));
    throw new ValidationError(issues.join('; '));
  }
  return parsed.data;
}
