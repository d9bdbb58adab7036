/**
 * Shared TypeScript types for Dosebell
 * Used by the backend and the chat transport adapters
 */

// ========== USERS ==========

export interface User {
  telegramId: number;
  username: string | null;
  timezone: string | null;
  createdAt: Date;
}

// ========== MEDICINES ==========

export interface Medicine {
  id: number;
  userId: number;
  name: string;
  createdAt: Date;
}

export interface Reminder {
  id: number;
  medicineId: number;
  time: string;
  dosage: string;
  active: boolean;
  createdAt: Date;
}

export interface MedicineWithReminders extends Medicine {
  reminders: Reminder[];
}

/** One (time, dosage) pair collected by the entry flow before it is saved. */
export interface ReminderEntry {
  time: string;
  dosage: string;
}

// ========== DELIVERY ==========

export type DeliveryStatus = 'sent' | 'failed';

export interface DeliveryLogEntry {
  id: number;
  reminderId: number;
  /** The user's calendar date (YYYY-MM-DD) the attempt counted for. */
  localDate: string;
  sentAt: Date;
  status: DeliveryStatus;
}

/**
 * A reminder joined with everything needed to schedule and deliver it.
 */
export interface ScheduledReminder {
  reminderId: number;
  medicineId: number;
  medicineName: string;
  time: string;
  dosage: string;
  userId: number;
  timezone: string;
  /** When the reminder row was written; earlier occurrences are never owed. */
  createdAt: Date;
}

// ========== CONVERSATION ==========

export interface InboundEvent {
  userId: number;
  username: string | null;
  text: string;
}

export interface OutboundMessage {
  text: string;
  /** Rows of reply buttons; absent means "leave the keyboard as is". */
  buttons?: string[][];
  /** Remove any reply keyboard the user currently sees. */
  removeKeyboard?: boolean;
}

export interface TimezoneOption {
  label: string;
  timezone: string;
}

// ========== ENGINE ==========

export interface ReminderEngineStatus {
  running: boolean;
  armed: number;
  nextWakeAt: string | null;
  lastRunAt: string | null;
}
