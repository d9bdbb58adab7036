import { DateTime } from 'luxon';
import { InvalidTimeOfDayError, InvalidTimezoneError } from './errors.js';

const CANONICAL_TIME = /^([01]\d|2[0-3]):([0-5]\d)$/;
const LOCAL_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface TimeOfDay {
  hour: number;
  minute: number;
}

const zeroPad = (value: number) => value.toString().padStart(2, '0');

export function formatTimeOfDay({ hour, minute }: TimeOfDay): string {
  return `${zeroPad(hour)}:${zeroPad(minute)}`;
}

export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone) return false;
  return DateTime.now().setZone(timeZone).isValid;
}

export function requireValidTimeZone(timeZone: string): string {
  if (!isValidTimeZone(timeZone)) {
    throw new InvalidTimezoneError(timeZone);
  }
  return timeZone;
}

export function isValidTimeOfDay(value: string): boolean {
  return CANONICAL_TIME.test(value);
}

/** Parses a canonical "HH:MM" value as stored on a reminder. */
export function parseTimeOfDay(value: string): TimeOfDay {
  const match = CANONICAL_TIME.exec(value);
  if (!match) {
    throw new InvalidTimeOfDayError(value);
  }
  return {
    hour: Number.parseInt(match[1] ?? '', 10),
    minute: Number.parseInt(match[2] ?? '', 10)
  };
}

/**
 * Accepts the forms people actually type ("8", "08", "8:30", "8.30", "830",
 * "1245") and returns "HH:MM". Out-of-range values are rejected, never clamped.
 */
export function normalizeTimeInput(input: string): string {
  const raw = input.trim().replace(/\s+/g, '');
  let hourRaw: string | undefined;
  let minuteRaw: string | undefined;

  const separated = /^(\d{1,2})[:.](\d{2})$/.exec(raw);
  const hourOnly = /^(\d{1,2})$/.exec(raw);
  const compact = /^(\d{1,2})(\d{2})$/.exec(raw);

  if (separated) {
    [, hourRaw, minuteRaw] = separated;
  } else if (hourOnly) {
    hourRaw = hourOnly[1];
    minuteRaw = '0';
  } else if (compact) {
    [, hourRaw, minuteRaw] = compact;
  }

  if (hourRaw === undefined || minuteRaw === undefined) {
    throw new InvalidTimeOfDayError(input);
  }

  const hour = Number.parseInt(hourRaw, 10);
  const minute = Number.parseInt(minuteRaw, 10);
  if (hour > 23 || minute > 59) {
    throw new InvalidTimeOfDayError(input);
  }
  return formatTimeOfDay({ hour, minute });
}

function localDateParts(localDate: string): { year: number; month: number; day: number } {
  const match = LOCAL_DATE.exec(localDate);
  if (!match) {
    throw new Error(`Invalid local date: ${localDate}`);
  }
  return {
    year: Number.parseInt(match[1] ?? '', 10),
    month: Number.parseInt(match[2] ?? '', 10),
    day: Number.parseInt(match[3] ?? '', 10)
  };
}

/**
 * Instant at which `time` occurs on `localDate` in `timeZone`. A local time
 * inside a DST gap is pushed forward by the size of the gap; a repeated local
 * time resolves to its first occurrence.
 */
export function occurrenceOn(timeZone: string, localDate: string, time: string): Date {
  requireValidTimeZone(timeZone);
  const { hour, minute } = parseTimeOfDay(time);
  const occurrence = DateTime.fromObject({ ...localDateParts(localDate), hour, minute }, { zone: timeZone });
  if (!occurrence.isValid) {
    throw new Error(`Invalid local date: ${localDate}`);
  }
  return occurrence.toJSDate();
}

export function localDateOf(instant: Date, timeZone: string): string {
  requireValidTimeZone(timeZone);
  const date = DateTime.fromJSDate(instant, { zone: timeZone }).toISODate();
  if (!date) {
    throw new InvalidTimezoneError(timeZone);
  }
  return date;
}

export function shiftLocalDate(localDate: string, days: number): string {
  const shifted = DateTime.fromObject(localDateParts(localDate), { zone: 'UTC' }).plus({ days }).toISODate();
  if (!shifted) {
    throw new Error(`Invalid local date: ${localDate}`);
  }
  return shifted;
}

/**
 * Earliest instant strictly after `reference` at which the wall clock in
 * `timeZone` shows `time`.
 */
export function nextDueInstant(timeZone: string, time: string, reference: Date): Date {
  requireValidTimeZone(timeZone);
  parseTimeOfDay(time);

  const today = localDateOf(reference, timeZone);
  // Tomorrow is normally enough; the extra day covers zones that skipped a calendar date.
  for (let offset = 0; offset <= 2; offset += 1) {
    const candidate = occurrenceOn(timeZone, shiftLocalDate(today, offset), time);
    if (candidate.getTime() > reference.getTime()) {
      return candidate;
    }
  }
  throw new Error(`Unable to resolve next occurrence of ${time} in ${timeZone}`);
}
