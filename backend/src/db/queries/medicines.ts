import type { Medicine, MedicineWithReminders, Reminder, ReminderEntry } from '@dosebell/shared';
import {
  MAX_DOSAGE_LENGTH,
  MAX_MEDICINE_NAME_LENGTH,
  db,
  requireText,
  toNumericId,
  withTransaction,
  type Queryable
} from './shared.js';
import { DataIntegrityError, NotFoundError, ValidationError } from '../../utils/errors.js';
import { isValidTimeOfDay, parseTimeOfDay } from '../../utils/timezone.js';

interface MedicineRow {
  id: number;
  user_id: string | number;
  name: string;
  created_at: Date;
}

export interface ReminderRow {
  id: number;
  medicine_id: number;
  time_of_day: string;
  dosage: string;
  active: boolean;
  created_at: Date;
}

const MEDICINE_COLUMNS = 'id, user_id, name, created_at';
export const REMINDER_COLUMNS = 'id, medicine_id, time_of_day, dosage, active, created_at';

function toMedicine(row: MedicineRow): Medicine {
  return {
    id: row.id,
    userId: toNumericId(row.user_id, 'medicines.user_id'),
    name: row.name,
    createdAt: row.created_at
  };
}

export function toReminder(row: ReminderRow): Reminder {
  if (!isValidTimeOfDay(row.time_of_day)) {
    throw new DataIntegrityError('Stored reminder time is not HH:MM', {
      reminderId: row.id,
      time: row.time_of_day
    });
  }
  return {
    id: row.id,
    medicineId: row.medicine_id,
    time: row.time_of_day,
    dosage: row.dosage,
    active: row.active,
    createdAt: row.created_at
  };
}

function byTime(a: Reminder, b: Reminder): number {
  return a.time.localeCompare(b.time);
}

export interface MedicineWriteData {
  name: string;
  entries: ReminderEntry[];
}

function normalizeWriteData(data: MedicineWriteData): MedicineWriteData {
  const name = requireText(data.name, 'Medicine name', MAX_MEDICINE_NAME_LENGTH);
  if (data.entries.length === 0) {
    throw new ValidationError('At least one reminder time is required');
  }

  const seen = new Set<string>();
  const entries = data.entries.map((entry) => {
    parseTimeOfDay(entry.time);
    if (seen.has(entry.time)) {
      throw new ValidationError(`Reminder time ${entry.time} is listed twice`, { time: entry.time });
    }
    seen.add(entry.time);
    return { time: entry.time, dosage: requireText(entry.dosage, 'Dosage', MAX_DOSAGE_LENGTH) };
  });

  return { name, entries };
}

async function insertReminders(
  client: Queryable,
  medicineId: number,
  entries: ReminderEntry[],
  createdAt: Date
): Promise<Reminder[]> {
  const reminders: Reminder[] = [];
  for (const entry of entries) {
    const result = await client.query<ReminderRow>(
      `INSERT INTO reminders (medicine_id, time_of_day, dosage, active, created_at)
       VALUES ($1, $2, $3, true, $4)
       RETURNING ${REMINDER_COLUMNS}`,
      [medicineId, entry.time, entry.dosage, createdAt]
    );
    const row = result.rows[0];
    if (!row) {
      throw new DataIntegrityError('Reminder insert returned no row', { medicineId });
    }
    reminders.push(toReminder(row));
  }
  return reminders.sort(byTime);
}

// Spelled out rather than left to ON DELETE CASCADE so the ids removed are known to the caller.
async function deleteReminderRows(client: Queryable, reminderIds: number[]): Promise<void> {
  for (const reminderId of reminderIds) {
    await client.query('DELETE FROM reminder_logs WHERE reminder_id = $1', [reminderId]);
    await client.query('DELETE FROM reminders WHERE id = $1', [reminderId]);
  }
}

/**
 * Writes a medicine and all of its reminders in one transaction.
 */
export async function createMedicineWithReminders(
  userId: number,
  data: MedicineWriteData,
  createdAt: Date = new Date()
): Promise<MedicineWithReminders> {
  const { name, entries } = normalizeWriteData(data);
  return withTransaction(async (client) => {
    const inserted = await client.query<MedicineRow>(
      `INSERT INTO medicines (user_id, name, created_at)
       VALUES ($1, $2, $3)
       RETURNING ${MEDICINE_COLUMNS}`,
      [userId, name, createdAt]
    );
    const row = inserted.rows[0];
    if (!row) {
      throw new DataIntegrityError('Medicine insert returned no row', { userId });
    }
    const reminders = await insertReminders(client, row.id, entries, createdAt);
    return { ...toMedicine(row), reminders };
  });
}

export interface ReplaceMedicineResult {
  medicine: MedicineWithReminders;
  removedReminderIds: number[];
}

/**
 * Renames a medicine and swaps its whole reminder set atomically. Delivery
 * logs of the replaced reminders go with them.
 */
export async function replaceMedicine(
  medicineId: number,
  userId: number,
  data: MedicineWriteData,
  createdAt: Date = new Date()
): Promise<ReplaceMedicineResult> {
  const { name, entries } = normalizeWriteData(data);
  return withTransaction(async (client) => {
    const updated = await client.query<MedicineRow>(
      `UPDATE medicines SET name = $3
       WHERE id = $1 AND user_id = $2
       RETURNING ${MEDICINE_COLUMNS}`,
      [medicineId, userId, name]
    );
    const row = updated.rows[0];
    if (!row) {
      throw new NotFoundError('Medicine not found', { medicineId, userId });
    }

    const existing = await client.query<{ id: number }>('SELECT id FROM reminders WHERE medicine_id = $1', [
      medicineId
    ]);
    const removedReminderIds = existing.rows.map((existingRow) => existingRow.id);
    await deleteReminderRows(client, removedReminderIds);
    const reminders = await insertReminders(client, medicineId, entries, createdAt);
    return {
      medicine: { ...toMedicine(row), reminders },
      removedReminderIds
    };
  });
}

export async function listMedicinesForUser(userId: number): Promise<MedicineWithReminders[]> {
  const medicines = await db.query<MedicineRow>(
    `SELECT ${MEDICINE_COLUMNS} FROM medicines WHERE user_id = $1 ORDER BY name ASC, id ASC`,
    [userId]
  );
  if (medicines.rows.length === 0) {
    return [];
  }

  const reminders = await db.query<ReminderRow>(
    `SELECT r.id, r.medicine_id, r.time_of_day, r.dosage, r.active, r.created_at
     FROM reminders r
     JOIN medicines m ON m.id = r.medicine_id
     WHERE m.user_id = $1
     ORDER BY r.time_of_day ASC`,
    [userId]
  );

  const byMedicine = new Map<number, Reminder[]>();
  for (const reminderRow of reminders.rows) {
    const reminder = toReminder(reminderRow);
    const list = byMedicine.get(reminder.medicineId) ?? [];
    list.push(reminder);
    byMedicine.set(reminder.medicineId, list);
  }

  return medicines.rows.map((row) => ({
    ...toMedicine(row),
    reminders: byMedicine.get(row.id) ?? []
  }));
}

export async function getMedicineForUser(
  medicineId: number,
  userId: number
): Promise<MedicineWithReminders | null> {
  const medicine = await db.query<MedicineRow>(
    `SELECT ${MEDICINE_COLUMNS} FROM medicines WHERE id = $1 AND user_id = $2`,
    [medicineId, userId]
  );
  const row = medicine.rows[0];
  if (!row) {
    return null;
  }
  const reminders = await db.query<ReminderRow>(
    `SELECT ${REMINDER_COLUMNS} FROM reminders WHERE medicine_id = $1 ORDER BY time_of_day ASC`,
    [medicineId]
  );
  return { ...toMedicine(row), reminders: reminders.rows.map(toReminder) };
}

/**
 * Deletes a medicine with its reminders and their logs. Returns the ids of the
 * reminders that went with it, or null when the medicine is not the user's.
 */
export async function deleteMedicine(medicineId: number, userId: number): Promise<number[] | null> {
  return withTransaction(async (client) => {
    const reminders = await client.query<{ id: number }>(
      `SELECT r.id
       FROM reminders r
       JOIN medicines m ON m.id = r.medicine_id
       WHERE m.id = $1 AND m.user_id = $2`,
      [medicineId, userId]
    );
    const owned = await client.query<{ id: number }>(
      'SELECT id FROM medicines WHERE id = $1 AND user_id = $2',
      [medicineId, userId]
    );
    if (owned.rows.length === 0) {
      return null;
    }
    const reminderIds = reminders.rows.map((reminderRow) => reminderRow.id);
    await deleteReminderRows(client, reminderIds);
    await client.query('DELETE FROM medicines WHERE id = $1', [medicineId]);
    return reminderIds;
  });
}

export interface DeleteAllResult {
  medicineCount: number;
  removedReminderIds: number[];
}

export async function deleteAllMedicinesForUser(userId: number): Promise<DeleteAllResult> {
  return withTransaction(async (client) => {
    const reminders = await client.query<{ id: number }>(
      `SELECT r.id
       FROM reminders r
       JOIN medicines m ON m.id = r.medicine_id
       WHERE m.user_id = $1`,
      [userId]
    );
    const removedReminderIds = reminders.rows.map((reminderRow) => reminderRow.id);
    await deleteReminderRows(client, removedReminderIds);
    const deleted = await client.query<{ id: number }>(
      'DELETE FROM medicines WHERE user_id = $1 RETURNING id',
      [userId]
    );
    return {
      medicineCount: deleted.rows.length,
      removedReminderIds
    };
  });
}
