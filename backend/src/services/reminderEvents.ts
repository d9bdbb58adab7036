import { EventEmitter } from 'events';

export type ReminderChange =
  | { kind: 'reminders-upserted'; reminderIds: number[] }
  | { kind: 'reminders-removed'; reminderIds: number[] }
  | { kind: 'user-changed'; userId: number };

export type ReminderChangeListener = (change: ReminderChange) => void;

const CHANGE_EVENT = 'change';

/**
 * Carries store mutations from the conversation side to the scheduling
 * engine. Publish only after the write has committed.
 */
export class ReminderEventBus extends EventEmitter {
  publish(change: ReminderChange): void {
    this.emit(CHANGE_EVENT, change);
  }

  subscribe(listener: ReminderChangeListener): () => void {
    this.on(CHANGE_EVENT, listener);
    return () => {
      this.off(CHANGE_EVENT, listener);
    };
  }
}

export const reminderEventBus = new ReminderEventBus();
