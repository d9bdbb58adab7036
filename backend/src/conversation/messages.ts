import type {
  MedicineWithReminders,
  OutboundMessage,
  Reminder,
  ReminderEntry,
  TimezoneOption
} from '@dosebell/shared';
import { MAX_DOSAGE_LENGTH, MAX_MEDICINE_NAME_LENGTH } from '../db/queries/shared.js';

export const BUTTONS = {
  addMedicine: '➕ Add medicine',
  myMedicines: '📋 My medicines',
  manage: '⚙️ Manage medicines',
  deleteAll: '🗑️ Delete all',
  changeTimezone: '🌍 Change timezone',
  help: 'ℹ️ Help',
  cancel: '❌ Cancel',
  save: '💾 Save',
  addTime: '➕ Add another time',
  edit: '✏️ Edit',
  removeThisTime: '🗑️ Remove this time',
  deleteMedicine: '🗑️ Delete medicine',
  confirmDelete: '✅ Yes, delete',
  confirmDeleteAll: '✅ Yes, delete everything',
  confirmDeleteAllFinal: '🚨 Delete for good',
  back: '⬅️ Back'
} as const;

export const COMMANDS = {
  start: '/start',
  help: '/help',
  cancel: '/cancel'
} as const;

const KEEP_PREFIX = '✅ Keep: ';

export const MAIN_MENU: string[][] = [
  [BUTTONS.addMedicine, BUTTONS.myMedicines],
  [BUTTONS.manage, BUTTONS.deleteAll],
  [BUTTONS.changeTimezone, BUTTONS.help]
];

const TIME_PRESETS = [
  { label: '🌅 Morning 08:00', time: '08:00' },
  { label: '☀️ Day 14:00', time: '14:00' },
  { label: '🌙 Evening 20:00', time: '20:00' }
] as const;

export const TIME_PRESET_BUTTONS: string[] = TIME_PRESETS.map((preset) => preset.label);

const TIME_EXAMPLE = 'Use 24-hour format, for example 08:00, 8:30 or 21.';

export const TEXT = {
  welcome: '👋 Welcome! I will remind you when it is time to take your medicines.',
  welcomeBack: '👋 Welcome back! What would you like to do?',
  chooseTimezone: '🌍 Choose your timezone:',
  timezoneInvalid: '⚠️ Please pick one of the timezones on the buttons below.',
  namePrompt: '💊 What is the medicine called?',
  nameInvalid: `⚠️ Enter a name of 1 to ${MAX_MEDICINE_NAME_LENGTH} characters.`,
  timePrompt: `⏰ At what time should I remind you? ${TIME_EXAMPLE} Or pick one below.`,
  dosageInvalid: `⚠️ Enter a dosage of 1 to ${MAX_DOSAGE_LENGTH} characters.`,
  confirmChoice: '⚠️ Please use the buttons below.',
  cancelled: '❌ Cancelled. Nothing was saved.',
  nothingToCancel: 'There is nothing to cancel.',
  menuPrompt: 'What would you like to do?',
  unknownCommand: '🤔 I did not understand that. Use the menu below.',
  noMedicines: `📋 You have no medicines yet. Tap "${BUTTONS.addMedicine}" to add one.`,
  medicineGone: '⚠️ That medicine no longer exists.',
  chooseMedicine: '⚙️ Which medicine do you want to manage?',
  nothingToDelete: 'You have no medicines to delete.',
  accessDenied: '❌ Sorry, access denied.\nAsk the administrator to add you to the list.',
  storageError: '⚠️ Something went wrong while saving your data. Please try again.',
  unexpectedError: '⚠️ Something went wrong. Please start again from the menu.',
  help: [
    'ℹ️ How it works',
    '',
    `${BUTTONS.addMedicine}: name a medicine, then add one or more times and the dose for each.`,
    `${BUTTONS.myMedicines}: see everything you take and when.`,
    `${BUTTONS.manage}: edit a medicine, pause or remove a single time, or delete it.`,
    `${BUTTONS.deleteAll}: remove every medicine at once.`,
    `${BUTTONS.changeTimezone}: reminders follow your local time.`,
    '',
    `Send ${COMMANDS.cancel} at any point to stop what you are doing.`
  ].join('\n')
} as const;

export function keepButton(value: string): string {
  return `${KEEP_PREFIX}${value}`;
}

/** The time behind a quick-pick button, or null for anything else. */
export function presetTime(text: string): string | null {
  return TIME_PRESETS.find((preset) => preset.label === text)?.time ?? null;
}

export function isCancel(text: string): boolean {
  return text === BUTTONS.cancel || text === COMMANDS.cancel;
}

export function withCancel(rows: string[][] = []): string[][] {
  return [...rows, [BUTTONS.cancel]];
}

export function mainMenu(text: string): OutboundMessage {
  return { text, buttons: MAIN_MENU };
}

export function inRows(labels: string[], perRow = 2): string[][] {
  const rows: string[][] = [];
  for (let index = 0; index < labels.length; index += perRow) {
    rows.push(labels.slice(index, index + perRow));
  }
  return rows;
}

export function timezoneKeyboard(options: TimezoneOption[]): string[][] {
  return withCancel(inRows(options.map((option) => option.label)));
}

export function invalidTime(input: string): string {
  return `⚠️ "${input}" is not a valid time. ${TIME_EXAMPLE}`;
}

export function duplicateTime(time: string): string {
  return `⚠️ ${time} is already on the list for this medicine. Enter a different time.`;
}

export function rewalkTimePrompt(position: number, time: string): string {
  return `⏰ Time ${position} is ${time}. Keep it, remove it or enter a new one.`;
}

export function dosagePrompt(time: string): string {
  return `💊 What dose at ${time}? For example: 1 tablet.`;
}

export function timezoneSaved(label: string): string {
  return `✅ Timezone set: ${label}`;
}

function byTime(a: ReminderEntry, b: ReminderEntry): number {
  return a.time.localeCompare(b.time);
}

export function draftSummary(name: string, entries: ReminderEntry[]): string {
  const lines = [...entries].sort(byTime).map((entry) => `⏰ ${entry.time} - ${entry.dosage}`);
  return ['📝 Check the details:', '', `💊 ${name}`, ...lines].join('\n');
}

function reminderCount(count: number): string {
  return count === 1 ? '1 reminder' : `${count} reminders`;
}

export function medicineSaved(medicine: MedicineWithReminders, edited: boolean): string {
  return `✅ ${edited ? 'Updated' : 'Saved'} ${medicine.name} with ${reminderCount(medicine.reminders.length)}.`;
}

function reminderLine(reminder: Reminder, indent: string): string {
  return reminder.active
    ? `${indent}⏰ ${reminder.time} - ${reminder.dosage}`
    : `${indent}⏸ ${reminder.time} - ${reminder.dosage} (paused)`;
}

export function formatMedicineList(medicines: MedicineWithReminders[], timezoneLabel: string | null): string {
  if (medicines.length === 0) {
    return TEXT.noMedicines;
  }
  const blocks = medicines.map((medicine, index) =>
    [`${index + 1}. 💊 ${medicine.name}`, ...medicine.reminders.map((reminder) => reminderLine(reminder, '   '))].join(
      '\n'
    )
  );
  const footer = timezoneLabel ? [`🌍 Timezone: ${timezoneLabel}`] : [];
  return ['📋 Your medicines:', ...blocks, ...footer].join('\n\n');
}

export function medicineDetails(medicine: MedicineWithReminders): string {
  return [`💊 ${medicine.name}`, ...medicine.reminders.map((reminder) => reminderLine(reminder, ''))].join('\n');
}
