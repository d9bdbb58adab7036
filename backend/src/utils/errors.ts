export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string = 'Validation failed', details?: unknown) {
    super(message, 'validation_failed', details);
  }
}

export class InvalidTimezoneError extends ValidationError {
  constructor(public readonly timezone: string) {
    super(`Invalid timezone: ${timezone}`, { timezone });
  }
}

export class InvalidTimeOfDayError extends ValidationError {
  constructor(public readonly value: string) {
    super(`Invalid time of day: ${value}`, { value });
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found', details?: unknown) {
    super(message, 'not_found', details);
  }
}

/** Transient failure talking to the database. Callers may retry. */
export class StorageError extends AppError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message, 'storage_failed');
  }
}

/** A stored row breaks an invariant the rest of the system relies on. Not recoverable. */
export class DataIntegrityError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'data_integrity', details);
  }
}

export class DeliveryError extends AppError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message, 'delivery_failed');
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
