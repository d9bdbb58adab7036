import type { OutboundMessage, ScheduledReminder } from '@dosebell/shared';
import { DeliveryError, describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { incrementMetric } from '../utils/metrics.js';

const log = createLogger('ReminderDelivery');

/** Whatever can push a message to a chat user; the Telegram adapter in production. */
export interface Notifier {
  send(userId: number, message: OutboundMessage): Promise<void>;
}

export type DispatchOutcome = { ok: true } | { ok: false; error: DeliveryError };

export function formatReminderMessage(reminder: Pick<ScheduledReminder, 'time' | 'medicineName' | 'dosage'>): string {
  return `💊 ${reminder.time} - Time to take ${reminder.medicineName} (${reminder.dosage})`;
}

/**
 * Sends one reminder. Never throws: transport failures come back as a
 * failed outcome so the engine can log them and move on.
 */
export class DeliveryDispatcher {
  constructor(private readonly notifier: Notifier) {}

  async dispatch(reminder: ScheduledReminder): Promise<DispatchOutcome> {
    try {
      await this.notifier.send(reminder.userId, { text: formatReminderMessage(reminder) });
      incrementMetric('reminder.delivery', 1, { status: 'sent' });
      return { ok: true };
    } catch (error) {
      incrementMetric('reminder.delivery', 1, { status: 'failed' });
      log.warn('Reminder delivery failed', {
        reminderId: reminder.reminderId,
        userId: reminder.userId,
        error: describeError(error)
      });
      return {
        ok: false,
        error: error instanceof DeliveryError ? error : new DeliveryError(describeError(error), error)
      };
    }
  }
}
