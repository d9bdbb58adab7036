import type { MedicineWithReminders, User } from '@dosebell/shared';
import {
  createMedicineWithReminders,
  deleteAllMedicinesForUser,
  deleteMedicine,
  deleteReminder,
  findUserById,
  getMedicineForUser,
  listMedicinesForUser,
  replaceMedicine,
  setReminderActive,
  setUserTimezone,
  upsertUser
} from '../db/queries.js';
import type { MedicineWriteData } from '../db/queries.js';
import { createLogger } from '../utils/logger.js';
import { reminderEventBus, type ReminderEventBus } from './reminderEvents.js';

const log = createLogger('MedicineService');

let events: ReminderEventBus = reminderEventBus;

/** Points change notifications at another bus; returns a restore function. */
export function __setEventBusForTests(bus: ReminderEventBus): () => void {
  const previous = events;
  events = bus;
  return () => {
    events = previous;
  };
}

function reminderIds(medicine: MedicineWithReminders): number[] {
  return medicine.reminders.map((reminder) => reminder.id);
}

export async function findUser(userId: number): Promise<User | null> {
  return findUserById(userId);
}

export async function completeOnboarding(
  userId: number,
  username: string | null,
  timezone: string
): Promise<User> {
  const user = await upsertUser(userId, username, timezone);
  events.publish({ kind: 'user-changed', userId });
  log.info('User onboarded', { userId, timezone });
  return user;
}

export async function changeTimezone(userId: number, timezone: string): Promise<User> {
  const user = await setUserTimezone(userId, timezone);
  events.publish({ kind: 'user-changed', userId });
  log.info('User timezone changed', { userId, timezone });
  return user;
}

export async function listMedicines(userId: number): Promise<MedicineWithReminders[]> {
  return listMedicinesForUser(userId);
}

export async function getMedicine(medicineId: number, userId: number): Promise<MedicineWithReminders | null> {
  return getMedicineForUser(medicineId, userId);
}

export async function saveNewMedicine(userId: number, data: MedicineWriteData): Promise<MedicineWithReminders> {
  const medicine = await createMedicineWithReminders(userId, data);
  events.publish({ kind: 'reminders-upserted', reminderIds: reminderIds(medicine) });
  log.info('Medicine saved', { userId, medicineId: medicine.id, reminders: medicine.reminders.length });
  return medicine;
}

export async function saveEditedMedicine(
  medicineId: number,
  userId: number,
  data: MedicineWriteData
): Promise<MedicineWithReminders> {
  const { medicine, removedReminderIds } = await replaceMedicine(medicineId, userId, data);
  if (removedReminderIds.length > 0) {
    events.publish({ kind: 'reminders-removed', reminderIds: removedReminderIds });
  }
  events.publish({ kind: 'reminders-upserted', reminderIds: reminderIds(medicine) });
  log.info('Medicine updated', { userId, medicineId, reminders: medicine.reminders.length });
  return medicine;
}

/** Returns false when the medicine is gone or not the user's. */
export async function removeMedicine(medicineId: number, userId: number): Promise<boolean> {
  const removed = await deleteMedicine(medicineId, userId);
  if (removed === null) {
    return false;
  }
  if (removed.length > 0) {
    events.publish({ kind: 'reminders-removed', reminderIds: removed });
  }
  log.info('Medicine deleted', { userId, medicineId });
  return true;
}

export async function removeAllMedicines(userId: number): Promise<number> {
  const { medicineCount, removedReminderIds } = await deleteAllMedicinesForUser(userId);
  if (removedReminderIds.length > 0) {
    events.publish({ kind: 'reminders-removed', reminderIds: removedReminderIds });
  }
  log.info('All medicines deleted', { userId, medicineCount });
  return medicineCount;
}

export async function removeReminder(reminderId: number, userId: number): Promise<boolean> {
  const removed = await deleteReminder(reminderId, userId);
  if (removed) {
    events.publish({ kind: 'reminders-removed', reminderIds: [reminderId] });
  }
  return removed;
}

export async function setReminderPaused(reminderId: number, userId: number, paused: boolean): Promise<boolean> {
  const updated = await setReminderActive(reminderId, userId, !paused);
  if (updated) {
    events.publish(
      paused
        ? { kind: 'reminders-removed', reminderIds: [reminderId] }
        : { kind: 'reminders-upserted', reminderIds: [reminderId] }
    );
  }
  return updated;
}
