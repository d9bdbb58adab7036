import type { OutboundMessage, ScheduledReminder } from '@dosebell/shared';
import type { EngineClock, TimerHandle } from './reminderEngine.js';
import type { Notifier } from './deliveryDispatcher.js';

interface PendingTimer {
  id: number;
  at: number;
  callback: () => void;
}

/**
 * Hand-driven clock for the scheduling engine. Timers only fire from
 * advanceTo(), in due order, with `settle` awaited after each so the engine
 * finishes its queued work before time moves on.
 */
export class ManualClock implements EngineClock {
  private current: number;
  private timers = new Map<number, PendingTimer>();
  private nextId = 1;

  constructor(start: Date | string) {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  setTimer(callback: () => void, delayMs: number): TimerHandle {
    const id = this.nextId++;
    this.timers.set(id, { id, at: this.current + delayMs, callback });
    return {
      cancel: () => {
        this.timers.delete(id);
      }
    };
  }

  pendingTimers(): number {
    return this.timers.size;
  }

  nextTimerAt(): Date | null {
    const next = this.earliest();
    return next ? new Date(next.at) : null;
  }

  async advanceTo(target: Date | string, settle: () => Promise<void>): Promise<void> {
    const targetMs = new Date(target).getTime();
    for (;;) {
      const next = this.earliest();
      if (!next || next.at > targetMs) {
        break;
      }
      this.timers.delete(next.id);
      this.current = Math.max(this.current, next.at);
      next.callback();
      await settle();
    }
    this.current = Math.max(this.current, targetMs);
  }

  private earliest(): PendingTimer | null {
    let found: PendingTimer | null = null;
    for (const timer of this.timers.values()) {
      if (!found || timer.at < found.at || (timer.at === found.at && timer.id < found.id)) {
        found = timer;
      }
    }
    return found;
  }
}

export interface SentMessage {
  userId: number;
  text: string;
  at: Date;
}

/** Records everything sent; `failFor` makes sends to those users throw. */
export class RecordingNotifier implements Notifier {
  readonly sent: SentMessage[] = [];
  readonly failFor = new Set<number>();

  constructor(private readonly clock: { now(): Date }) {}

  async send(userId: number, message: OutboundMessage): Promise<void> {
    if (this.failFor.has(userId)) {
      throw new Error(`chat ${userId} is unreachable`);
    }
    this.sent.push({ userId, text: message.text, at: this.clock.now() });
  }

  texts(): string[] {
    return this.sent.map((message) => message.text);
  }
}

export function scheduledReminder(overrides: Partial<ScheduledReminder> = {}): ScheduledReminder {
  return {
    reminderId: 1,
    medicineId: 1,
    medicineName: 'Aspirin',
    time: '08:00',
    dosage: '1 tablet',
    userId: 1001,
    timezone: 'UTC',
    createdAt: new Date('2025-01-01T00:00:00.000Z'),
    ...overrides
  };
}
