import type { z } from 'zod';
import { ValidationError } from '../errors.js';

export function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown, what = 'request body'): z.output<T> {
  const result = schema.safeParse(value);

  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, result.error.flatten().fieldErrors);
  }

  return result.data;
}
