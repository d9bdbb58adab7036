import type { ScheduledReminder } from '@dosebell/shared';
import { db, toDate, toNumericId, withTransaction, type Queryable } from './shared.js';
import { listDeliveryLogsSince } from './reminderLogs.js';
import { DataIntegrityError } from '../../utils/errors.js';
import { isValidTimeOfDay, isValidTimeZone, localDateOf, occurrenceOn } from '../../utils/timezone.js';

interface ScheduledReminderRow {
  reminder_id: number;
  medicine_id: number;
  medicine_name: string;
  time_of_day: string;
  dosage: string;
  user_id: string | number;
  timezone: string;
  created_at: Date | string;
}

// Users without a timezone have not finished onboarding and are never scheduled.
const SCHEDULED_SELECTION = `
  SELECT
    r.id AS reminder_id,
    r.medicine_id,
    m.name AS medicine_name,
    r.time_of_day,
    r.dosage,
    u.telegram_id AS user_id,
    u.timezone,
    r.created_at
  FROM reminders r
  JOIN medicines m ON m.id = r.medicine_id
  JOIN users u ON u.telegram_id = m.user_id
  WHERE r.active = true AND u.timezone IS NOT NULL
`;

const LOG_LOOKBACK_MS = 48 * 60 * 60 * 1000;

function toScheduledReminder(row: ScheduledReminderRow): ScheduledReminder {
  if (!isValidTimeOfDay(row.time_of_day) || !isValidTimeZone(row.timezone)) {
    throw new DataIntegrityError('Stored reminder cannot be scheduled', {
      reminderId: row.reminder_id,
      time: row.time_of_day,
      timezone: row.timezone
    });
  }
  return {
    reminderId: row.reminder_id,
    medicineId: row.medicine_id,
    medicineName: row.medicine_name,
    time: row.time_of_day,
    dosage: row.dosage,
    userId: toNumericId(row.user_id, 'users.telegram_id'),
    timezone: row.timezone,
    createdAt: toDate(row.created_at)
  };
}

export async function getScheduledReminder(reminderId: number): Promise<ScheduledReminder | null> {
  const result = await db.query<ScheduledReminderRow>(`${SCHEDULED_SELECTION} AND r.id = $1`, [
    reminderId
  ]);
  return result.rows[0] ? toScheduledReminder(result.rows[0]) : null;
}

export async function listActiveScheduledReminders(): Promise<ScheduledReminder[]> {
  const result = await db.query<ScheduledReminderRow>(
    `${SCHEDULED_SELECTION} ORDER BY r.time_of_day ASC, r.id ASC`
  );
  return result.rows.map(toScheduledReminder);
}

export async function listActiveScheduledRemindersForUser(userId: number): Promise<ScheduledReminder[]> {
  const result = await db.query<ScheduledReminderRow>(
    `${SCHEDULED_SELECTION} AND u.telegram_id = $1 ORDER BY r.time_of_day ASC, r.id ASC`,
    [userId]
  );
  return result.rows.map(toScheduledReminder);
}

async function findOwnedReminderId(
  client: Queryable,
  reminderId: number,
  userId: number
): Promise<number | null> {
  const owned = await client.query<{ id: number }>(
    `SELECT r.id
     FROM reminders r
     JOIN medicines m ON m.id = r.medicine_id
     WHERE r.id = $1 AND m.user_id = $2`,
    [reminderId, userId]
  );
  return owned.rows[0]?.id ?? null;
}

/** Returns false when the reminder does not belong to the user. */
export async function setReminderActive(
  reminderId: number,
  userId: number,
  active: boolean
): Promise<boolean> {
  return withTransaction(async (client) => {
    const owned = await findOwnedReminderId(client, reminderId, userId);
    if (owned === null) {
      return false;
    }
    await client.query('UPDATE reminders SET active = $2 WHERE id = $1', [reminderId, active]);
    return true;
  });
}

export async function deleteReminder(reminderId: number, userId: number): Promise<boolean> {
  return withTransaction(async (client) => {
    const owned = await findOwnedReminderId(client, reminderId, userId);
    if (owned === null) {
      return false;
    }
    await client.query('DELETE FROM reminder_logs WHERE reminder_id = $1', [reminderId]);
    const deleted = await client.query<{ id: number }>(
      'DELETE FROM reminders WHERE id = $1 RETURNING id',
      [reminderId]
    );
    return deleted.rows.length > 0;
  });
}

export interface DueReminder extends ScheduledReminder {
  /** Today's occurrence in the user's zone. */
  dueAt: Date;
  localDate: string;
}

export interface DueReminderOptions {
  /** Occurrences older than this are skipped for the day instead of sent late. */
  graceMinutes?: number;
}

/**
 * Active reminders whose occurrence on the user's local date of `now` is at
 * or before `now` and has no log entry for that local date. The date is the
 * one in the user's current zone, so moving west after a send does not make
 * the same day owed again.
 */
export async function listDueReminders(
  now: Date,
  options: DueReminderOptions = {}
): Promise<DueReminder[]> {
  const reminders = await listActiveScheduledReminders();
  if (reminders.length === 0) {
    return [];
  }

  const logs = await listDeliveryLogsSince(new Date(now.getTime() - LOG_LOOKBACK_MS));
  const attempted = new Set(logs.map((log) => `${log.reminderId}@${log.localDate}`));

  const earliest =
    options.graceMinutes === undefined ? Number.NEGATIVE_INFINITY : now.getTime() - options.graceMinutes * 60_000;

  const due: DueReminder[] = [];
  for (const reminder of reminders) {
    const localDate = localDateOf(now, reminder.timezone);
    const dueAt = occurrenceOn(reminder.timezone, localDate, reminder.time);
    const dueMs = dueAt.getTime();
    // An occurrence that passed before the reminder existed is not owed.
    if (dueMs > now.getTime() || dueMs < earliest || dueMs < reminder.createdAt.getTime()) {
      continue;
    }
    if (attempted.has(`${reminder.reminderId}@${localDate}`)) {
      continue;
    }
    due.push({ ...reminder, dueAt, localDate });
  }

  return due.sort((a, b) => a.dueAt.getTime() - b.dueAt.getTime() || a.reminderId - b.reminderId);
}
