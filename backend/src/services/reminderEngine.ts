import type { DeliveryStatus, ReminderEngineStatus, ScheduledReminder } from '@dosebell/shared';
import {
  appendDeliveryLog,
  getScheduledReminder,
  listActiveScheduledReminders,
  listActiveScheduledRemindersForUser,
  listDueReminders
} from '../db/queries.js';
import type { DueReminder, DueReminderOptions } from '../db/queries.js';
import { DataIntegrityError, describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { incrementMetric } from '../utils/metrics.js';
import { nextDueInstant } from '../utils/timezone.js';
import type { DispatchOutcome } from './deliveryDispatcher.js';
import type { ReminderChange, ReminderEventBus } from './reminderEvents.js';

const log = createLogger('ReminderEngine');

// setTimeout overflows past 2^31-1 ms.
const MAX_TIMER_DELAY_MS = 2_147_483_647;
const ATTEMPT_MEMORY_MS = 48 * 60 * 60 * 1000;

export interface ReminderEngineStore {
  listActiveScheduledReminders(): Promise<ScheduledReminder[]>;
  listActiveScheduledRemindersForUser(userId: number): Promise<ScheduledReminder[]>;
  getScheduledReminder(reminderId: number): Promise<ScheduledReminder | null>;
  listDueReminders(now: Date, options?: DueReminderOptions): Promise<DueReminder[]>;
  appendDeliveryLog(
    reminderId: number,
    localDate: string,
    sentAt: Date,
    status: DeliveryStatus
  ): Promise<unknown>;
}

export interface ReminderDispatcher {
  dispatch(reminder: ScheduledReminder): Promise<DispatchOutcome>;
}

export interface TimerHandle {
  cancel(): void;
}

export interface EngineClock {
  now(): Date;
  setTimer(callback: () => void, delayMs: number): TimerHandle;
}

export const systemClock: EngineClock = {
  now: () => new Date(),
  setTimer(callback, delayMs) {
    const timer = setTimeout(callback, delayMs);
    return {
      cancel: () => clearTimeout(timer)
    };
  }
};

const defaultStore: ReminderEngineStore = {
  listActiveScheduledReminders,
  listActiveScheduledRemindersForUser,
  getScheduledReminder,
  listDueReminders,
  appendDeliveryLog
};

export interface ReminderEngineOptions {
  dispatcher: ReminderDispatcher;
  store?: ReminderEngineStore;
  clock?: EngineClock;
  graceMinutes?: number;
  resyncIntervalMs?: number;
  retryDelayMs?: number;
  /** Called once when stored data is unusable; the engine has stopped by then. */
  onFatal?: (error: DataIntegrityError) => void;
}

interface ArmedReminder {
  reminder: ScheduledReminder;
  dueAt: Date;
}

/**
 * Keeps one timer armed for the earliest upcoming reminder and delivers every
 * reminder that is due when it fires. All work runs through a single queue, so
 * a firing drains completely before any change signal or resync is applied.
 */
export class ReminderEngine {
  private readonly store: ReminderEngineStore;
  private readonly dispatcher: ReminderDispatcher;
  private readonly clock: EngineClock;
  private readonly graceMinutes: number;
  private readonly resyncIntervalMs: number;
  private readonly retryDelayMs: number;
  private readonly onFatal: ((error: DataIntegrityError) => void) | undefined;

  private readonly armed = new Map<number, ArmedReminder>();
  // Occurrences sent by this process, keyed by reminder and local date, in
  // case the log write after a send did not land.
  private readonly attempted = new Map<string, number>();
  private queue: Promise<void> = Promise.resolve();
  private timer: TimerHandle | null = null;
  private nextWakeAt: Date | null = null;
  private lastRunAt: Date | null = null;
  private lastResyncAt = 0;
  private resyncPending = false;
  private running = false;
  private unsubscribe: (() => void) | null = null;

  constructor(options: ReminderEngineOptions) {
    this.dispatcher = options.dispatcher;
    this.store = options.store ?? defaultStore;
    this.clock = options.clock ?? systemClock;
    this.graceMinutes = options.graceMinutes ?? 120;
    this.resyncIntervalMs = options.resyncIntervalMs ?? 15 * 60 * 1000;
    this.retryDelayMs = options.retryDelayMs ?? 30_000;
    this.onFatal = options.onFatal;
  }

  /** Loads every active reminder, sends what is still owed, then arms the timer. */
  start(): Promise<void> {
    if (this.running) {
      return this.queue;
    }
    this.running = true;
    log.info('Starting', { graceMinutes: this.graceMinutes, resyncIntervalMs: this.resyncIntervalMs });
    return this.enqueue('start', async () => {
      await this.resync();
      await this.fireDue();
    });
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.detach();
    this.cancelTimer();
    await this.queue;
    log.info('Stopped');
  }

  /** Follows store mutations published on the bus until stop() or the returned function is called. */
  attach(bus: ReminderEventBus): () => void {
    this.detach();
    const unsubscribe = bus.subscribe((change) => {
      void this.applyChange(change);
    });
    this.unsubscribe = unsubscribe;
    return () => {
      if (this.unsubscribe === unsubscribe) {
        this.detach();
      }
    };
  }

  applyChange(change: ReminderChange): Promise<void> {
    switch (change.kind) {
      case 'reminders-upserted':
        return this.remindersChanged(change.reminderIds);
      case 'reminders-removed':
        return this.remindersRemoved(change.reminderIds);
      case 'user-changed':
        return this.userChanged(change.userId);
    }
  }

  /** Re-reads the reminders and re-arms them; ones that are gone or paused are dropped. */
  remindersChanged(reminderIds: number[]): Promise<void> {
    return this.enqueue('reminders-changed', async () => {
      const now = this.clock.now();
      for (const reminderId of reminderIds) {
        const reminder = await this.store.getScheduledReminder(reminderId);
        if (reminder) {
          this.arm(reminder, now);
        } else {
          this.armed.delete(reminderId);
        }
      }
      // A signal handled after the minute it was saved for still owes that minute.
      await this.fireDue();
    });
  }

  remindersRemoved(reminderIds: number[]): Promise<void> {
    return this.enqueue('reminders-removed', async () => {
      for (const reminderId of reminderIds) {
        this.armed.delete(reminderId);
      }
    });
  }

  /** A timezone change moves every reminder of the user. */
  userChanged(userId: number): Promise<void> {
    return this.enqueue('user-changed', async () => {
      const reminders = await this.store.listActiveScheduledRemindersForUser(userId);
      for (const [reminderId, entry] of this.armed) {
        if (entry.reminder.userId === userId) {
          this.armed.delete(reminderId);
        }
      }
      const now = this.clock.now();
      for (const reminder of reminders) {
        this.arm(reminder, now);
      }
      await this.fireDue();
    });
  }

  /** Resolves once everything queued so far has run. */
  idle(): Promise<void> {
    return this.queue;
  }

  status(): ReminderEngineStatus {
    return {
      running: this.running,
      armed: this.armed.size,
      nextWakeAt: this.nextWakeAt ? this.nextWakeAt.toISOString() : null,
      lastRunAt: this.lastRunAt ? this.lastRunAt.toISOString() : null
    };
  }

  private enqueue(label: string, task: () => Promise<void>): Promise<void> {
    const run = this.queue.then(async () => {
      if (!this.running) {
        return;
      }
      try {
        await task();
        this.scheduleWake();
      } catch (error) {
        this.handleFailure(label, error);
      }
    });
    this.queue = run;
    return run;
  }

  private onTimer(): void {
    this.timer = null;
    this.nextWakeAt = null;
    void this.enqueue('tick', async () => {
      const now = this.clock.now().getTime();
      if (this.resyncPending || now - this.lastResyncAt >= this.resyncIntervalMs) {
        await this.resync();
      }
      await this.fireDue();
    });
  }

  private async resync(): Promise<void> {
    const reminders = await this.store.listActiveScheduledReminders();
    const now = this.clock.now();
    this.armed.clear();
    for (const reminder of reminders) {
      this.arm(reminder, now);
    }
    this.lastResyncAt = now.getTime();
    this.resyncPending = false;
    log.debug('Resynced', { armed: this.armed.size });
  }

  private arm(reminder: ScheduledReminder, now: Date): void {
    this.armed.set(reminder.reminderId, {
      reminder,
      dueAt: nextDueInstant(reminder.timezone, reminder.time, now)
    });
  }

  private async fireDue(): Promise<void> {
    const now = this.clock.now();
    this.lastRunAt = now;
    this.forgetOldAttempts(now);

    const due = await this.store.listDueReminders(now, { graceMinutes: this.graceMinutes });
    for (const reminder of due) {
      const key = `${reminder.reminderId}@${reminder.localDate}`;
      if (this.attempted.has(key)) {
        continue;
      }
      this.attempted.set(key, reminder.dueAt.getTime());
      await this.deliver(reminder);
    }

    // Everything at or before now has been handled; move it to its next occurrence.
    const after = this.clock.now();
    for (const reminder of due) {
      if (!this.armed.has(reminder.reminderId)) {
        this.arm(reminder, after);
      }
    }
    for (const entry of this.armed.values()) {
      if (entry.dueAt.getTime() <= after.getTime()) {
        entry.dueAt = nextDueInstant(entry.reminder.timezone, entry.reminder.time, after);
      }
    }
  }

  private async deliver(reminder: DueReminder): Promise<void> {
    const outcome = await this.dispatcher.dispatch(reminder);
    const status: DeliveryStatus = outcome.ok ? 'sent' : 'failed';
    const lateMs = this.clock.now().getTime() - reminder.dueAt.getTime();
    incrementMetric('reminder.fired', 1, { status });
    if (outcome.ok) {
      log.info('Reminder sent', { reminderId: reminder.reminderId, userId: reminder.userId, lateMs });
    } else {
      log.warn('Reminder not delivered; next attempt is the next occurrence', {
        reminderId: reminder.reminderId,
        userId: reminder.userId,
        error: outcome.error.message
      });
    }

    try {
      await this.store.appendDeliveryLog(reminder.reminderId, reminder.localDate, this.clock.now(), status);
    } catch (error) {
      if (error instanceof DataIntegrityError) {
        throw error;
      }
      incrementMetric('reminder.log_failed');
      log.error('Failed to record delivery attempt', {
        reminderId: reminder.reminderId,
        status,
        error: describeError(error)
      });
    }
  }

  private forgetOldAttempts(now: Date): void {
    const cutoff = now.getTime() - ATTEMPT_MEMORY_MS;
    for (const [key, dueAt] of this.attempted) {
      if (dueAt < cutoff) {
        this.attempted.delete(key);
      }
    }
  }

  private handleFailure(label: string, error: unknown): void {
    if (error instanceof DataIntegrityError) {
      log.error('Stored data is inconsistent; stopping', { task: label, error: error.message, details: error.details });
      incrementMetric('reminder.engine_fatal');
      this.running = false;
      this.detach();
      this.cancelTimer();
      this.onFatal?.(error);
      return;
    }

    incrementMetric('reminder.engine_retry', 1, { task: label });
    log.error(`Task ${label} failed; retrying in ${this.retryDelayMs}ms`, { error: describeError(error) });
    this.resyncPending = true;
    this.scheduleWake(this.clock.now().getTime() + this.retryDelayMs);
  }

  private scheduleWake(retryAt?: number): void {
    if (!this.running) {
      return;
    }
    this.cancelTimer();

    const now = this.clock.now().getTime();
    let wakeAt = retryAt ?? Math.max(now, this.lastResyncAt + this.resyncIntervalMs);
    if (this.resyncPending && retryAt === undefined) {
      wakeAt = Math.min(wakeAt, now + this.retryDelayMs);
    }
    for (const entry of this.armed.values()) {
      const dueAt = entry.dueAt.getTime();
      // After a failed firing, overdue entries wait for the retry.
      if (retryAt !== undefined && dueAt <= now) {
        continue;
      }
      wakeAt = Math.min(wakeAt, dueAt);
    }

    const delay = Math.min(Math.max(0, wakeAt - now), MAX_TIMER_DELAY_MS);
    this.nextWakeAt = new Date(now + delay);
    this.timer = this.clock.setTimer(() => this.onTimer(), delay);
  }

  private cancelTimer(): void {
    this.timer?.cancel();
    this.timer = null;
    this.nextWakeAt = null;
  }

  private detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }
}
