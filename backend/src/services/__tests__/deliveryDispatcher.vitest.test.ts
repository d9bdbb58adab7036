import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { OutboundMessage } from '@dosebell/shared';
import { DeliveryError } from '../../utils/errors.js';
import { __resetMetricsForTests, metricsSnapshot } from '../../utils/metrics.js';
import { DeliveryDispatcher, formatReminderMessage, type Notifier } from '../deliveryDispatcher.js';
import { scheduledReminder } from '../reminderEngine.testDoubles.js';

beforeEach(() => {
  __resetMetricsForTests();
});

describe('formatReminderMessage', () => {
  it('names the time, medicine and dose', () => {
    expect(formatReminderMessage({ time: '08:00', medicineName: 'Aspirin', dosage: '1 tablet' })).toBe(
      '💊 08:00 - Time to take Aspirin (1 tablet)'
    );
  });
});

describe('DeliveryDispatcher', () => {
  it('sends the reminder text to the owning user', async () => {
    const sent: Array<[number, OutboundMessage]> = [];
    const notifier: Notifier = {
      send: async (userId, message) => {
        sent.push([userId, message]);
      }
    };
    const reminder = scheduledReminder({ userId: 42, time: '21:30', medicineName: 'Vitamin D', dosage: '2 drops' });

    const outcome = await new DeliveryDispatcher(notifier).dispatch(reminder);

    expect(outcome).toEqual({ ok: true });
    expect(sent).toEqual([[42, { text: '💊 21:30 - Time to take Vitamin D (2 drops)' }]]);
    expect(metricsSnapshot()).toEqual({ 'reminder.delivery|status=sent': 1 });
  });

  it('reports transport failures instead of throwing', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const notifier: Notifier = {
      send: async () => {
        throw new Error('Forbidden: bot was blocked by the user');
      }
    };

    const outcome = await new DeliveryDispatcher(notifier).dispatch(scheduledReminder({ reminderId: 7, userId: 42 }));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(DeliveryError);
      expect(outcome.error.message).toBe('Forbidden: bot was blocked by the user');
    }
    expect(warn).toHaveBeenCalledWith('[ReminderDelivery] Reminder delivery failed', {
      reminderId: 7,
      userId: 42,
      error: 'Forbidden: bot was blocked by the user'
    });
    expect(metricsSnapshot()).toEqual({ 'reminder.delivery|status=failed': 1 });
  });
});
