import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { wireMemDatabase, type WiredMemDatabase } from '../memDb.testUtils.js';
import {
  appendDeliveryLog,
  createMedicineWithReminders,
  deleteAllMedicinesForUser,
  deleteMedicine,
  deleteReminder,
  findUserById,
  getMedicineForUser,
  getScheduledReminder,
  listActiveScheduledReminders,
  listDeliveryLogsForReminder,
  listDueReminders,
  listMedicinesForUser,
  replaceMedicine,
  setReminderActive,
  setUserTimezone,
  upsertUser
} from '../queries.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';

const OWNER = 1001;
const STRANGER = 2002;
const CREATED_AT = new Date('2025-06-01T00:00:00.000Z');

let wired: WiredMemDatabase;

beforeEach(() => {
  wired = wireMemDatabase();
});

afterEach(() => {
  wired.restore();
});

async function seedAspirin() {
  await upsertUser(OWNER, 'owner', 'UTC');
  return createMedicineWithReminders(
    OWNER,
    {
      name: 'Aspirin',
      entries: [
        { time: '09:00', dosage: '1 tablet' },
        { time: '08:00', dosage: '2 tablets' }
      ]
    },
    CREATED_AT
  );
}

describe('users', () => {
  it('creates on first upsert and refreshes afterwards', async () => {
    await upsertUser(OWNER, 'owner', 'Europe/Kyiv');
    await upsertUser(OWNER, 'renamed', 'Europe/Berlin');

    const user = await findUserById(OWNER);
    expect(user).toMatchObject({ telegramId: OWNER, username: 'renamed', timezone: 'Europe/Berlin' });
  });

  it('returns null for unknown users', async () => {
    expect(await findUserById(OWNER)).toBeNull();
  });

  it('refuses a timezone change for a user that does not exist', async () => {
    await expect(setUserTimezone(OWNER, 'UTC')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('rejects invalid zones before touching the database', async () => {
    await expect(upsertUser(OWNER, null, 'Nowhere/City')).rejects.toBeInstanceOf(ValidationError);
    expect(await findUserById(OWNER)).toBeNull();
  });
});

describe('medicines', () => {
  it('saves a medicine with its reminders sorted by time', async () => {
    const saved = await seedAspirin();

    expect(saved.name).toBe('Aspirin');
    expect(saved.reminders.map((reminder) => [reminder.time, reminder.dosage, reminder.active])).toEqual([
      ['08:00', '2 tablets', true],
      ['09:00', '1 tablet', true]
    ]);

    const listed = await listMedicinesForUser(OWNER);
    expect(listed).toHaveLength(1);
    expect(listed[0]?.reminders.map((reminder) => reminder.time)).toEqual(['08:00', '09:00']);
  });

  it('trims names and dosages', async () => {
    await upsertUser(OWNER, null, 'UTC');
    const saved = await createMedicineWithReminders(OWNER, {
      name: '  Vitamin D  ',
      entries: [{ time: '10:00', dosage: ' 1 drop ' }]
    });
    expect(saved.name).toBe('Vitamin D');
    expect(saved.reminders[0]?.dosage).toBe('1 drop');
  });

  it('rejects a medicine with no reminders', async () => {
    await upsertUser(OWNER, null, 'UTC');
    await expect(createMedicineWithReminders(OWNER, { name: 'Aspirin', entries: [] })).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(await listMedicinesForUser(OWNER)).toEqual([]);
  });

  it('rejects the same time twice within one medicine', async () => {
    await upsertUser(OWNER, null, 'UTC');
    await expect(
      createMedicineWithReminders(OWNER, {
        name: 'Aspirin',
        entries: [
          { time: '08:00', dosage: '1' },
          { time: '08:00', dosage: '2' }
        ]
      })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(await listMedicinesForUser(OWNER)).toEqual([]);
  });

  it('hides other users medicines', async () => {
    const saved = await seedAspirin();
    expect(await getMedicineForUser(saved.id, STRANGER)).toBeNull();
    expect(await getMedicineForUser(saved.id, OWNER)).toMatchObject({ id: saved.id, name: 'Aspirin' });
  });

  it('replaces name and reminder set in one step', async () => {
    const saved = await seedAspirin();
    const oldIds = saved.reminders.map((reminder) => reminder.id);

    const { medicine, removedReminderIds } = await replaceMedicine(saved.id, OWNER, {
      name: 'Aspirin Cardio',
      entries: [{ time: '20:00', dosage: '1 tablet' }]
    });

    expect(removedReminderIds.sort((a, b) => a - b)).toEqual([...oldIds].sort((a, b) => a - b));
    expect(medicine.name).toBe('Aspirin Cardio');
    expect(medicine.reminders.map((reminder) => reminder.time)).toEqual(['20:00']);

    const reloaded = await getMedicineForUser(saved.id, OWNER);
    expect(reloaded?.reminders.map((reminder) => reminder.time)).toEqual(['20:00']);
  });

  it('does not let another user replace a medicine', async () => {
    const saved = await seedAspirin();
    await expect(
      replaceMedicine(saved.id, STRANGER, { name: 'Mine', entries: [{ time: '07:00', dosage: '1' }] })
    ).rejects.toBeInstanceOf(NotFoundError);
    expect((await getMedicineForUser(saved.id, OWNER))?.name).toBe('Aspirin');
  });

  it('deletes a medicine together with its reminders and logs', async () => {
    const saved = await seedAspirin();
    const first = saved.reminders[0];
    if (!first) throw new Error('expected a reminder');
    await appendDeliveryLog(first.id, '2025-06-02', new Date('2025-06-02T08:00:00.000Z'), 'sent');

    expect(await deleteMedicine(saved.id, STRANGER)).toBeNull();

    const removed = await deleteMedicine(saved.id, OWNER);
    expect(removed?.sort((a, b) => a - b)).toEqual(saved.reminders.map((reminder) => reminder.id).sort((a, b) => a - b));
    expect(await listMedicinesForUser(OWNER)).toEqual([]);
    expect(await listActiveScheduledReminders()).toEqual([]);
    expect(await listDeliveryLogsForReminder(first.id)).toEqual([]);
  });

  it('deletes every medicine of one user only', async () => {
    await seedAspirin();
    await upsertUser(STRANGER, null, 'UTC');
    await createMedicineWithReminders(STRANGER, { name: 'Ibuprofen', entries: [{ time: '12:00', dosage: '1' }] });

    const result = await deleteAllMedicinesForUser(OWNER);

    expect(result.medicineCount).toBe(1);
    expect(result.removedReminderIds).toHaveLength(2);
    expect(await listMedicinesForUser(OWNER)).toEqual([]);
    expect((await listMedicinesForUser(STRANGER)).map((medicine) => medicine.name)).toEqual(['Ibuprofen']);
  });
});

describe('single reminders', () => {
  it('pauses and resumes a reminder the user owns', async () => {
    const saved = await seedAspirin();
    const reminder = saved.reminders[0];
    if (!reminder) throw new Error('expected a reminder');

    expect(await setReminderActive(reminder.id, STRANGER, false)).toBe(false);
    expect(await setReminderActive(reminder.id, OWNER, false)).toBe(true);
    expect(await getScheduledReminder(reminder.id)).toBeNull();

    expect(await setReminderActive(reminder.id, OWNER, true)).toBe(true);
    expect(await getScheduledReminder(reminder.id)).toMatchObject({
      reminderId: reminder.id,
      medicineName: 'Aspirin',
      time: '08:00',
      dosage: '2 tablets',
      userId: OWNER,
      timezone: 'UTC'
    });
  });

  it('deletes one reminder and keeps the rest', async () => {
    const saved = await seedAspirin();
    const reminder = saved.reminders[0];
    if (!reminder) throw new Error('expected a reminder');

    expect(await deleteReminder(reminder.id, STRANGER)).toBe(false);
    expect(await deleteReminder(reminder.id, OWNER)).toBe(true);
    expect((await getMedicineForUser(saved.id, OWNER))?.reminders.map((r) => r.time)).toEqual(['09:00']);
  });
});

describe('listDueReminders', () => {
  it('lists occurrences at or before now that were not attempted', async () => {
    const saved = await seedAspirin();
    const now = new Date('2025-06-02T08:30:00.000Z');

    const due = await listDueReminders(now);

    expect(due.map((reminder) => [reminder.time, reminder.dueAt.toISOString(), reminder.localDate])).toEqual([
      ['08:00', '2025-06-02T08:00:00.000Z', '2025-06-02']
    ]);
    expect(due[0]?.reminderId).toBe(saved.reminders[0]?.id);
  });

  it('returns nothing once an attempt has been logged', async () => {
    const saved = await seedAspirin();
    const reminder = saved.reminders[0];
    if (!reminder) throw new Error('expected a reminder');
    const now = new Date('2025-06-02T08:30:00.000Z');

    await appendDeliveryLog(reminder.id, '2025-06-02', new Date('2025-06-02T08:00:01.000Z'), 'failed');

    expect(await listDueReminders(now)).toEqual([]);
  });

  it('does not count yesterday as today', async () => {
    const saved = await seedAspirin();
    const reminder = saved.reminders[0];
    if (!reminder) throw new Error('expected a reminder');

    await appendDeliveryLog(reminder.id, '2025-06-01', new Date('2025-06-01T08:00:00.000Z'), 'sent');

    const due = await listDueReminders(new Date('2025-06-02T08:30:00.000Z'));
    expect(due.map((entry) => entry.reminderId)).toEqual([reminder.id]);
  });

  it('skips occurrences older than the grace window', async () => {
    await seedAspirin();
    const now = new Date('2025-06-02T11:00:00.000Z');

    const due = await listDueReminders(now, { graceMinutes: 120 });

    expect(due.map((reminder) => reminder.time)).toEqual(['09:00']);
  });

  it('orders by due instant', async () => {
    await seedAspirin();
    const due = await listDueReminders(new Date('2025-06-02T10:00:00.000Z'));
    expect(due.map((reminder) => reminder.time)).toEqual(['08:00', '09:00']);
  });

  it('leaves out paused reminders and occurrences before the reminder existed', async () => {
    const saved = await seedAspirin();
    const paused = saved.reminders[1];
    if (!paused) throw new Error('expected a reminder');
    await setReminderActive(paused.id, OWNER, false);

    await createMedicineWithReminders(
      OWNER,
      { name: 'Late addition', entries: [{ time: '08:05', dosage: '1' }] },
      new Date('2025-06-02T08:10:00.000Z')
    );

    const due = await listDueReminders(new Date('2025-06-02T10:00:00.000Z'));
    expect(due.map((reminder) => `${reminder.medicineName} ${reminder.time}`)).toEqual(['Aspirin 08:00']);
  });

  it('keys attempts by local date, so moving west does not make the day owed again', async () => {
    const saved = await seedAspirin();
    const reminder = saved.reminders[0];
    if (!reminder) throw new Error('expected a reminder');
    // Sent at 08:00 Kyiv time before the user switched zones.
    await appendDeliveryLog(reminder.id, '2025-06-02', new Date('2025-06-02T05:00:00.000Z'), 'sent');
    await setUserTimezone(OWNER, 'Europe/London');

    const due = await listDueReminders(new Date('2025-06-02T08:30:00.000Z'));

    expect(due.map((entry) => [entry.time, entry.dueAt.toISOString()])).toEqual([
      ['09:00', '2025-06-02T08:00:00.000Z']
    ]);
    expect((await listDeliveryLogsForReminder(reminder.id)).map((entry) => entry.localDate)).toEqual(['2025-06-02']);
  });

  it('evaluates each user in their own timezone', async () => {
    await upsertUser(OWNER, null, 'Asia/Tokyo');
    await createMedicineWithReminders(OWNER, { name: 'Tokyo pill', entries: [{ time: '08:00', dosage: '1' }] }, CREATED_AT);
    await upsertUser(STRANGER, null, 'America/New_York');
    await createMedicineWithReminders(
      STRANGER,
      { name: 'New York pill', entries: [{ time: '08:00', dosage: '1' }] },
      CREATED_AT
    );

    // 2025-06-02T00:00Z is 09:00 in Tokyo and 20:00 of June 1 in New York.
    const due = await listDueReminders(new Date('2025-06-02T00:00:00.000Z'), { graceMinutes: 120 });

    expect(due.map((reminder) => [reminder.medicineName, reminder.dueAt.toISOString()])).toEqual([
      ['Tokyo pill', '2025-06-01T23:00:00.000Z']
    ]);
  });
});
