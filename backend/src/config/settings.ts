import { resolve } from 'path';
import { z } from 'zod';
import { parseWithSchema } from '../utils/validation.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const settingsSchema = z.object({
  DATABASE_URL: z.string().min(1),
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  ACCESS_LIST_PATH: z.string().min(1).default('config/allowed_users.txt'),
  ACCESS_LIST_TTL_MS: positiveInt(30_000),
  TIMEZONES_PATH: z.string().min(1).default('config/timezones.json'),
  // Below a day, so a late catch-up can never land on the next occurrence.
  REMINDER_GRACE_MINUTES: z.coerce.number().int().min(0).max(1439).default(120),
  REMINDER_RESYNC_INTERVAL_MS: positiveInt(15 * 60 * 1000),
  REMINDER_RETRY_DELAY_MS: positiveInt(30_000),
  PORT: positiveInt(3000)
});

export interface Settings {
  databaseUrl: string;
  telegramBotToken: string;
  accessListPath: string;
  accessListTtlMs: number;
  timezonesPath: string;
  reminderGraceMinutes: number;
  reminderResyncIntervalMs: number;
  reminderRetryDelayMs: number;
  port: number;
}

/**
 * Reads and validates runtime settings. Relative file paths resolve against
 * the working directory, which is the backend package when started through npm.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = parseWithSchema(env, settingsSchema);
  return {
    databaseUrl: parsed.DATABASE_URL,
    telegramBotToken: parsed.TELEGRAM_BOT_TOKEN,
    accessListPath: resolve(parsed.ACCESS_LIST_PATH),
    accessListTtlMs: parsed.ACCESS_LIST_TTL_MS,
    timezonesPath: resolve(parsed.TIMEZONES_PATH),
    reminderGraceMinutes: parsed.REMINDER_GRACE_MINUTES,
    reminderResyncIntervalMs: parsed.REMINDER_RESYNC_INTERVAL_MS,
    reminderRetryDelayMs: parsed.REMINDER_RETRY_DELAY_MS,
    port: parsed.PORT
  };
}
