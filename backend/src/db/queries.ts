export { findUserById, setUserTimezone, upsertUser } from './queries/users.js';

export {
  createMedicineWithReminders,
  deleteAllMedicinesForUser,
  deleteMedicine,
  getMedicineForUser,
  listMedicinesForUser,
  replaceMedicine
} from './queries/medicines.js';
export type {
  DeleteAllResult,
  MedicineWriteData,
  ReplaceMedicineResult
} from './queries/medicines.js';

export {
  deleteReminder,
  getScheduledReminder,
  listActiveScheduledReminders,
  listActiveScheduledRemindersForUser,
  listDueReminders,
  setReminderActive
} from './queries/reminders.js';
export type { DueReminder, DueReminderOptions } from './queries/reminders.js';

export {
  appendDeliveryLog,
  listDeliveryLogsForReminder,
  listDeliveryLogsSince
} from './queries/reminderLogs.js';
