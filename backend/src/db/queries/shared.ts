import db, { withTransaction, type Queryable } from '../client.js';
import { DataIntegrityError, ValidationError } from '../../utils/errors.js';

export { db, withTransaction };
export type { Queryable };

export const MAX_MEDICINE_NAME_LENGTH = 100;
export const MAX_DOSAGE_LENGTH = 50;

/** BIGINT columns come back from pg as strings; pg-mem hands back numbers. */
export function toNumericId(value: string | number, column: string): number {
  const parsed = typeof value === 'number' ? value : Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new DataIntegrityError(`Column ${column} holds a non-integer value`, { value });
  }
  return parsed;
}

export function toDate(value: Date | string): Date {
  return value instanceof Date ? value : new Date(value);
}

export function requireText(value: string, field: string, maxLength: number): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`${field} is required`, { field });
  }
  if (trimmed.length > maxLength) {
    throw new ValidationError(`${field} is too long`, { field, maxLength });
  }
  return trimmed;
}
