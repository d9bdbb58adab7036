import { z, type ZodTypeAny } from 'zod';
import { ValidationError } from './errors.js';

export function parseWithSchema<T extends ZodTypeAny>(value: unknown, schema: T): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError('Validation failed', result.error.format());
  }
  return result.data;
}
