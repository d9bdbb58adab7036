import type { DeliveryLogEntry, DeliveryStatus } from '@dosebell/shared';
import { db, toDate } from './shared.js';
import { DataIntegrityError } from '../../utils/errors.js';

interface ReminderLogRow {
  id: number;
  reminder_id: number;
  local_date: string;
  sent_at: Date | string;
  status: string;
}

const LOG_COLUMNS = 'id, reminder_id, local_date, sent_at, status';

function toStatus(value: string, id: number): DeliveryStatus {
  if (value === 'sent' || value === 'failed') {
    return value;
  }
  throw new DataIntegrityError('Unknown delivery log status', { id, status: value });
}

function toLogEntry(row: ReminderLogRow): DeliveryLogEntry {
  return {
    id: row.id,
    reminderId: row.reminder_id,
    localDate: row.local_date,
    sentAt: toDate(row.sent_at),
    status: toStatus(row.status, row.id)
  };
}

/**
 * Append-only: one row per dispatch attempt, whatever its outcome.
 * `localDate` is the user's calendar date of the occurrence, not of `sentAt`.
 */
export async function appendDeliveryLog(
  reminderId: number,
  localDate: string,
  sentAt: Date,
  status: DeliveryStatus
): Promise<DeliveryLogEntry> {
  const result = await db.query<ReminderLogRow>(
    `INSERT INTO reminder_logs (reminder_id, local_date, sent_at, status)
     VALUES ($1, $2, $3, $4)
     RETURNING ${LOG_COLUMNS}`,
    [reminderId, localDate, sentAt, status]
  );
  const row = result.rows[0];
  if (!row) {
    throw new DataIntegrityError('Delivery log insert returned no row', { reminderId });
  }
  return toLogEntry(row);
}

export async function listDeliveryLogsSince(since: Date): Promise<DeliveryLogEntry[]> {
  const result = await db.query<ReminderLogRow>(
    `SELECT ${LOG_COLUMNS} FROM reminder_logs WHERE sent_at >= $1 ORDER BY sent_at ASC`,
    [since]
  );
  return result.rows.map(toLogEntry);
}

export async function listDeliveryLogsForReminder(reminderId: number): Promise<DeliveryLogEntry[]> {
  const result = await db.query<ReminderLogRow>(
    `SELECT ${LOG_COLUMNS} FROM reminder_logs WHERE reminder_id = $1 ORDER BY sent_at ASC`,
    [reminderId]
  );
  return result.rows.map(toLogEntry);
}
