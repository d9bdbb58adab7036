import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { wireMemDatabase, type WiredMemDatabase } from '../../db/memDb.testUtils.js';
import { findUserById, upsertUser } from '../../db/queries.js';
import { TimezoneCatalog } from '../../config/timezones.js';
import * as medicineService from '../../services/medicineService.js';
import { ReminderEventBus, type ReminderChange } from '../../services/reminderEvents.js';
import { EntryFlow } from '../entryFlow.js';
import { BUTTONS, TEXT } from '../messages.js';
import type { FlowContext } from '../types.js';

const OWNER = 1001;

const catalog = new TimezoneCatalog([
  { label: '🇺🇦 Kyiv', timezone: 'Europe/Kyiv' },
  { label: '🌐 UTC', timezone: 'UTC' }
]);

let wired: WiredMemDatabase;
let restoreBus: () => void;
let changes: ReminderChange[];

function context(): FlowContext {
  return { userId: OWNER, username: 'owner', timezones: catalog, medicines: medicineService };
}

async function walk(flow: EntryFlow, inputs: string[]) {
  let last = await flow.start();
  for (const input of inputs) {
    last = await flow.handle(input);
  }
  return last;
}

beforeEach(() => {
  wired = wireMemDatabase();
  const bus = new ReminderEventBus();
  changes = [];
  bus.subscribe((change) => changes.push(change));
  restoreBus = medicineService.__setEventBusForTests(bus);
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  restoreBus();
  wired.restore();
});

describe('EntryFlow onboarding', () => {
  it('asks for a timezone and stores the user once one is picked', async () => {
    const flow = EntryFlow.onboarding(context());

    const started = await flow.start();
    expect(started.replies.map((message) => message.text)).toEqual([TEXT.welcome, TEXT.chooseTimezone]);
    expect(started.replies[1]?.buttons).toEqual([['🇺🇦 Kyiv', '🌐 UTC'], [BUTTONS.cancel]]);

    const rejected = await flow.handle('Atlantis');
    expect(flow.state).toBe('AwaitingTimezone');
    expect(rejected.replies[0]?.text).toBe(TEXT.timezoneInvalid);
    expect(await findUserById(OWNER)).toBeNull();

    const accepted = await flow.handle('🇺🇦 Kyiv');
    expect(flow.state).toBe('AwaitingMedicineName');
    expect(accepted.replies.map((message) => message.text)).toEqual(['✅ Timezone set: 🇺🇦 Kyiv', TEXT.namePrompt]);
    expect(await findUserById(OWNER)).toMatchObject({ username: 'owner', timezone: 'Europe/Kyiv' });
    expect(changes).toEqual([{ kind: 'user-changed', userId: OWNER }]);
  });
});

describe('EntryFlow new medicine', () => {
  beforeEach(async () => {
    await upsertUser(OWNER, 'owner', 'UTC');
  });

  it('collects several times and saves them together', async () => {
    const flow = EntryFlow.newMedicine(context());

    const dosageStep = await walk(flow, ['Aspirin', '8']);
    expect(flow.state).toBe('AwaitingDosage');
    expect(dosageStep.replies[0]?.text).toBe('💊 What dose at 08:00? For example: 1 tablet.');

    await flow.handle('1 tablet');
    expect(flow.state).toBe('AwaitingConfirmation');

    await flow.handle(BUTTONS.addTime);
    expect(flow.state).toBe('AwaitingTime');
    await flow.handle('2130');
    const confirmation = await flow.handle('2 tablets');
    expect(confirmation.replies[0]).toEqual({
      text: '📝 Check the details:\n\n💊 Aspirin\n⏰ 08:00 - 1 tablet\n⏰ 21:30 - 2 tablets',
      buttons: [
        [BUTTONS.save, BUTTONS.addTime],
        [BUTTONS.edit, BUTTONS.cancel]
      ]
    });

    const saved = await flow.handle(BUTTONS.save);
    expect(flow.state).toBe('Saved');
    expect(saved).toEqual({ replies: [{ text: '✅ Saved Aspirin with 2 reminders.' }], done: true });

    const medicines = await medicineService.listMedicines(OWNER);
    expect(medicines.map((medicine) => medicine.name)).toEqual(['Aspirin']);
    expect(medicines[0]?.reminders.map((reminder) => [reminder.time, reminder.dosage])).toEqual([
      ['08:00', '1 tablet'],
      ['21:30', '2 tablets']
    ]);
    expect(changes).toEqual([
      { kind: 'reminders-upserted', reminderIds: medicines[0]?.reminders.map((reminder) => reminder.id) }
    ]);
  });

  it('offers quick-pick times and takes them like typed ones', async () => {
    const flow = EntryFlow.newMedicine(context());

    const timePrompt = await walk(flow, ['Aspirin']);
    expect(timePrompt.replies[0]).toEqual({
      text: '⏰ At what time should I remind you? Use 24-hour format, for example 08:00, 8:30 or 21. Or pick one below.',
      buttons: [['🌅 Morning 08:00', '☀️ Day 14:00', '🌙 Evening 20:00'], [BUTTONS.cancel]]
    });

    const dosageStep = await flow.handle('🌙 Evening 20:00');
    expect(dosageStep.replies[0]?.text).toBe('💊 What dose at 20:00? For example: 1 tablet.');

    await flow.handle('1 tablet');
    await flow.handle(BUTTONS.addTime);
    const duplicate = await flow.handle('🌙 Evening 20:00');
    expect(duplicate.replies[0]?.text).toBe('⚠️ 20:00 is already on the list for this medicine. Enter a different time.');

    await flow.handle('☀️ Day 14:00');
    await flow.handle('half a tablet');
    await flow.handle(BUTTONS.save);

    const [medicine] = await medicineService.listMedicines(OWNER);
    expect(medicine?.reminders.map((reminder) => [reminder.time, reminder.dosage])).toEqual([
      ['14:00', 'half a tablet'],
      ['20:00', '1 tablet']
    ]);
  });

  it('keeps asking for the time when it is out of range', async () => {
    const flow = EntryFlow.newMedicine(context());

    const step = await walk(flow, ['Aspirin', '25:00']);

    expect(flow.state).toBe('AwaitingTime');
    expect(step.replies[0]?.text).toBe('⚠️ "25:00" is not a valid time. Use 24-hour format, for example 08:00, 8:30 or 21.');

    await flow.handle('8');
    expect(flow.state).toBe('AwaitingDosage');
  });

  it('rejects a time that is already on the list', async () => {
    const flow = EntryFlow.newMedicine(context());

    const step = await walk(flow, ['Aspirin', '08:00', '1 tablet', BUTTONS.addTime, '8']);

    expect(flow.state).toBe('AwaitingTime');
    expect(step.replies[0]?.text).toBe('⚠️ 08:00 is already on the list for this medicine. Enter a different time.');
  });

  it('re-prompts for blank or overlong names and dosages', async () => {
    const flow = EntryFlow.newMedicine(context());

    expect((await walk(flow, ['   '])).replies[0]?.text).toBe(TEXT.nameInvalid);
    expect((await flow.handle('x'.repeat(101))).replies[0]?.text).toBe(TEXT.nameInvalid);
    expect(flow.state).toBe('AwaitingMedicineName');

    await flow.handle('  Aspirin  ');
    await flow.handle('9');
    expect((await flow.handle('')).replies[0]?.text).toBe(TEXT.dosageInvalid);
    expect((await flow.handle('y'.repeat(51))).replies[0]?.text).toBe(TEXT.dosageInvalid);
    expect(flow.state).toBe('AwaitingDosage');
  });

  it.each([
    [[] as string[], 'AwaitingMedicineName'],
    [['Aspirin'], 'AwaitingTime'],
    [['Aspirin', '8'], 'AwaitingDosage'],
    [['Aspirin', '8', '1 tablet'], 'AwaitingConfirmation']
  ])('persists nothing when cancelled after %j', async (inputs, stateBeforeCancel) => {
    const flow = EntryFlow.newMedicine(context());
    await walk(flow, inputs);
    expect(flow.state).toBe(stateBeforeCancel);

    const cancelled = await flow.handle(BUTTONS.cancel);

    expect(flow.state).toBe('Idle');
    expect(cancelled).toEqual({ replies: [{ text: TEXT.cancelled }], done: true });
    expect(await medicineService.listMedicines(OWNER)).toEqual([]);
    expect(changes).toEqual([]);
  });

  it('re-walks every value with Keep buttons after Edit', async () => {
    const flow = EntryFlow.newMedicine(context());
    await walk(flow, ['Aspirin', '8', '1 tablet']);

    const namePrompt = await flow.handle(BUTTONS.edit);
    expect(flow.state).toBe('AwaitingMedicineName');
    expect(namePrompt.replies[0]?.buttons).toEqual([['✅ Keep: Aspirin'], [BUTTONS.cancel]]);

    const timePrompt = await flow.handle('✅ Keep: Aspirin');
    expect(timePrompt.replies[0]).toEqual({
      text: '⏰ Time 1 is 08:00. Keep it, remove it or enter a new one.',
      buttons: [['✅ Keep: 08:00', BUTTONS.removeThisTime], [BUTTONS.cancel]]
    });

    const dosagePrompt = await flow.handle('9');
    expect(dosagePrompt.replies[0]?.buttons).toEqual([['✅ Keep: 1 tablet'], [BUTTONS.cancel]]);

    const confirmation = await flow.handle('✅ Keep: 1 tablet');
    expect(confirmation.replies[0]?.text).toBe('📝 Check the details:\n\n💊 Aspirin\n⏰ 09:00 - 1 tablet');

    await flow.handle(BUTTONS.save);
    const [medicine] = await medicineService.listMedicines(OWNER);
    expect(medicine?.reminders.map((reminder) => reminder.time)).toEqual(['09:00']);
  });

  it('asks for a fresh time when every pre-filled one was removed', async () => {
    const flow = EntryFlow.newMedicine(context());
    await walk(flow, ['Aspirin', '8', '1 tablet', BUTTONS.edit, '✅ Keep: Aspirin']);

    const step = await flow.handle(BUTTONS.removeThisTime);

    expect(flow.state).toBe('AwaitingTime');
    expect(step.replies[0]).toEqual({
      text: TEXT.timePrompt,
      buttons: [['🌅 Morning 08:00', '☀️ Day 14:00', '🌙 Evening 20:00'], [BUTTONS.cancel]]
    });
  });
});

describe('EntryFlow editing a stored medicine', () => {
  beforeEach(async () => {
    await upsertUser(OWNER, 'owner', 'UTC');
  });

  it('replaces name and times in one save', async () => {
    const original = await medicineService.saveNewMedicine(OWNER, {
      name: 'Aspirin',
      entries: [
        { time: '08:00', dosage: '1 tablet' },
        { time: '20:00', dosage: '1 tablet' }
      ]
    });
    changes.length = 0;
    const flow = EntryFlow.editMedicine(context(), original);

    const started = await flow.start();
    expect(started.replies[0]?.buttons).toEqual([['✅ Keep: Aspirin'], [BUTTONS.cancel]]);

    await flow.handle('Aspirin Forte');
    await flow.handle('✅ Keep: 08:00');
    const secondTime = await flow.handle('2 tablets');
    expect(secondTime.replies[0]?.text).toBe('⏰ Time 2 is 20:00. Keep it, remove it or enter a new one.');

    const confirmation = await flow.handle(BUTTONS.removeThisTime);
    expect(flow.state).toBe('AwaitingConfirmation');
    expect(confirmation.replies[0]?.text).toBe('📝 Check the details:\n\n💊 Aspirin Forte\n⏰ 08:00 - 2 tablets');

    const saved = await flow.handle(BUTTONS.save);
    expect(saved.replies[0]?.text).toBe('✅ Updated Aspirin Forte with 1 reminder.');

    const reloaded = await medicineService.getMedicine(original.id, OWNER);
    expect(reloaded?.name).toBe('Aspirin Forte');
    expect(reloaded?.reminders.map((reminder) => [reminder.time, reminder.dosage])).toEqual([['08:00', '2 tablets']]);
    expect(changes.map((change) => change.kind)).toEqual(['reminders-removed', 'reminders-upserted']);
  });

  it('ends without saving when the medicine was deleted meanwhile', async () => {
    const original = await medicineService.saveNewMedicine(OWNER, {
      name: 'Aspirin',
      entries: [{ time: '08:00', dosage: '1 tablet' }]
    });
    const flow = EntryFlow.editMedicine(context(), original);
    await walk(flow, ['✅ Keep: Aspirin', '✅ Keep: 08:00', '✅ Keep: 1 tablet']);
    await medicineService.removeMedicine(original.id, OWNER);

    const step = await flow.handle(BUTTONS.save);

    expect(flow.state).toBe('Idle');
    expect(step).toEqual({ replies: [{ text: TEXT.medicineGone }], done: true });
    expect(await medicineService.listMedicines(OWNER)).toEqual([]);
  });
});
