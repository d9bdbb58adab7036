import type { MedicineWithReminders, OutboundMessage, ReminderEntry } from '@dosebell/shared';
import { MAX_DOSAGE_LENGTH, MAX_MEDICINE_NAME_LENGTH } from '../db/queries/shared.js';
import { InvalidTimeOfDayError, NotFoundError } from '../utils/errors.js';
import { normalizeTimeInput } from '../utils/timezone.js';
import {
  BUTTONS,
  TEXT,
  TIME_PRESET_BUTTONS,
  dosagePrompt,
  draftSummary,
  duplicateTime,
  invalidTime,
  isCancel,
  keepButton,
  medicineSaved,
  presetTime,
  rewalkTimePrompt,
  timezoneKeyboard,
  timezoneSaved,
  withCancel
} from './messages.js';
import { finish, reply, type ConversationFlow, type FlowContext, type FlowStep } from './types.js';

export type EntryFlowState =
  | 'AwaitingTimezone'
  | 'AwaitingMedicineName'
  | 'AwaitingTime'
  | 'AwaitingDosage'
  | 'AwaitingConfirmation'
  | 'Saved'
  | 'Idle';

interface Draft {
  name: string | null;
  entries: ReminderEntry[];
  pendingTime: string | null;
}

/** Values from a previous pass, offered back one by one as "Keep" buttons. */
interface Prefill {
  name: string;
  entries: ReminderEntry[];
}

const CONFIRMATION_KEYBOARD = [
  [BUTTONS.save, BUTTONS.addTime],
  [BUTTONS.edit, BUTTONS.cancel]
];

function emptyDraft(): Draft {
  return { name: null, entries: [], pendingTime: null };
}

/**
 * Walks a user through naming a medicine and collecting its (time, dosage)
 * pairs. Everything stays in memory until Save, which writes the medicine and
 * all reminders in one transaction.
 */
export class EntryFlow implements ConversationFlow {
  readonly name = 'entry';

  private current: EntryFlowState;
  private draft: Draft = emptyDraft();
  private prefill: Prefill | null = null;
  // Index into prefill.entries of the entry being re-walked.
  private rewalkIndex = 0;
  // The prefill entry consumed by the time step; its dosage is offered next.
  private pendingPrefill: ReminderEntry | null = null;

  private constructor(
    private readonly context: FlowContext,
    initial: EntryFlowState,
    private readonly medicineId: number | null
  ) {
    this.current = initial;
  }

  /** New users pick a timezone first; the user record is written once they do. */
  static onboarding(context: FlowContext): EntryFlow {
    return new EntryFlow(context, 'AwaitingTimezone', null);
  }

  static newMedicine(context: FlowContext): EntryFlow {
    return new EntryFlow(context, 'AwaitingMedicineName', null);
  }

  /** Re-walks an existing medicine with its current values pre-filled; Save replaces it. */
  static editMedicine(context: FlowContext, medicine: MedicineWithReminders): EntryFlow {
    const flow = new EntryFlow(context, 'AwaitingMedicineName', medicine.id);
    flow.prefill = {
      name: medicine.name,
      entries: medicine.reminders.map((reminder) => ({ time: reminder.time, dosage: reminder.dosage }))
    };
    return flow;
  }

  get state(): EntryFlowState {
    return this.current;
  }

  get isEditing(): boolean {
    return this.medicineId !== null;
  }

  async start(): Promise<FlowStep> {
    if (this.current === 'AwaitingTimezone') {
      return reply({ text: TEXT.welcome }, this.timezonePrompt());
    }
    return reply(this.namePrompt());
  }

  cancel(): FlowStep {
    this.current = 'Idle';
    this.draft = emptyDraft();
    return finish({ text: TEXT.cancelled });
  }

  async handle(input: string): Promise<FlowStep> {
    const text = input.trim();
    if (isCancel(text)) {
      return this.cancel();
    }

    switch (this.current) {
      case 'AwaitingTimezone':
        return this.handleTimezone(text);
      case 'AwaitingMedicineName':
        return this.handleName(text);
      case 'AwaitingTime':
        return this.handleTime(text);
      case 'AwaitingDosage':
        return this.handleDosage(text);
      case 'AwaitingConfirmation':
        return this.handleConfirmation(text);
      case 'Saved':
      case 'Idle':
        return finish();
    }
  }

  private async handleTimezone(text: string): Promise<FlowStep> {
    const option = this.context.timezones.match(text);
    if (!option) {
      return reply({ text: TEXT.timezoneInvalid, buttons: this.timezonePrompt().buttons });
    }
    await this.context.medicines.completeOnboarding(this.context.userId, this.context.username, option.timezone);
    this.current = 'AwaitingMedicineName';
    return reply({ text: timezoneSaved(option.label) }, this.namePrompt());
  }

  private handleName(text: string): FlowStep {
    const name = this.prefill && text === keepButton(this.prefill.name) ? this.prefill.name : text;
    if (name.length === 0 || name.length > MAX_MEDICINE_NAME_LENGTH) {
      return reply({ text: TEXT.nameInvalid, buttons: this.namePrompt().buttons });
    }
    this.draft.name = name;
    this.current = 'AwaitingTime';
    return reply(this.timePrompt());
  }

  private handleTime(text: string): FlowStep {
    const prefillEntry = this.nextPrefillEntry();

    if (prefillEntry && text === BUTTONS.removeThisTime) {
      this.rewalkIndex += 1;
      return this.afterEntry();
    }

    let time: string;
    const picked = prefillEntry && text === keepButton(prefillEntry.time) ? prefillEntry.time : presetTime(text);
    if (picked !== null) {
      time = picked;
    } else {
      try {
        time = normalizeTimeInput(text);
      } catch (error) {
        if (error instanceof InvalidTimeOfDayError) {
          return reply({ text: invalidTime(text), buttons: this.timePrompt().buttons });
        }
        throw error;
      }
    }

    if (this.draft.entries.some((entry) => entry.time === time)) {
      return reply({ text: duplicateTime(time), buttons: this.timePrompt().buttons });
    }

    this.draft.pendingTime = time;
    if (prefillEntry) {
      this.pendingPrefill = prefillEntry;
      this.rewalkIndex += 1;
    }
    this.current = 'AwaitingDosage';
    return reply(this.dosagePromptFor(time));
  }

  private handleDosage(text: string): FlowStep {
    const time = this.draft.pendingTime;
    if (time === null) {
      this.current = 'AwaitingTime';
      return reply(this.timePrompt());
    }

    const keep = this.pendingPrefill;
    const dosage = keep && text === keepButton(keep.dosage) ? keep.dosage : text;
    if (dosage.length === 0 || dosage.length > MAX_DOSAGE_LENGTH) {
      return reply({ text: TEXT.dosageInvalid, buttons: this.dosagePromptFor(time).buttons });
    }

    this.draft.entries.push({ time, dosage });
    this.draft.pendingTime = null;
    this.pendingPrefill = null;
    return this.afterEntry();
  }

  private async handleConfirmation(text: string): Promise<FlowStep> {
    switch (text) {
      case BUTTONS.save:
        return this.save();
      case BUTTONS.addTime:
        this.current = 'AwaitingTime';
        return reply(this.timePrompt());
      case BUTTONS.edit:
        return this.restartWithPrefill();
      default:
        return reply({ text: TEXT.confirmChoice }, this.confirmationPrompt());
    }
  }

  private async save(): Promise<FlowStep> {
    const name = this.draft.name;
    if (name === null || this.draft.entries.length === 0) {
      this.current = name === null ? 'AwaitingMedicineName' : 'AwaitingTime';
      return reply(name === null ? this.namePrompt() : this.timePrompt());
    }

    const data = { name, entries: [...this.draft.entries] };
    const { userId, medicines } = this.context;
    let saved: MedicineWithReminders;
    if (this.medicineId === null) {
      saved = await medicines.saveNewMedicine(userId, data);
    } else {
      try {
        saved = await medicines.saveEditedMedicine(this.medicineId, userId, data);
      } catch (error) {
        if (error instanceof NotFoundError) {
          this.current = 'Idle';
          return finish({ text: TEXT.medicineGone });
        }
        throw error;
      }
    }

    this.current = 'Saved';
    return finish({ text: medicineSaved(saved, this.isEditing) });
  }

  private restartWithPrefill(): FlowStep {
    if (this.draft.name !== null) {
      this.prefill = { name: this.draft.name, entries: [...this.draft.entries] };
    }
    this.draft = emptyDraft();
    this.rewalkIndex = 0;
    this.pendingPrefill = null;
    this.current = 'AwaitingMedicineName';
    return reply(this.namePrompt());
  }

  /** After an entry is added or dropped: next pre-filled entry, confirmation, or a fresh time. */
  private afterEntry(): FlowStep {
    if (this.nextPrefillEntry() || this.draft.entries.length === 0) {
      this.current = 'AwaitingTime';
      return reply(this.timePrompt());
    }
    this.current = 'AwaitingConfirmation';
    return reply(this.confirmationPrompt());
  }

  private nextPrefillEntry(): ReminderEntry | null {
    return this.prefill?.entries[this.rewalkIndex] ?? null;
  }

  private timezonePrompt(): OutboundMessage {
    return { text: TEXT.chooseTimezone, buttons: timezoneKeyboard(this.context.timezones.options()) };
  }

  private namePrompt(): OutboundMessage {
    const keep = this.prefill ? [[keepButton(this.prefill.name)]] : [];
    return { text: TEXT.namePrompt, buttons: withCancel(keep) };
  }

  private timePrompt(): OutboundMessage {
    const entry = this.nextPrefillEntry();
    if (entry) {
      return {
        text: rewalkTimePrompt(this.rewalkIndex + 1, entry.time),
        buttons: withCancel([[keepButton(entry.time), BUTTONS.removeThisTime]])
      };
    }
    return { text: TEXT.timePrompt, buttons: withCancel([TIME_PRESET_BUTTONS]) };
  }

  private dosagePromptFor(time: string): OutboundMessage {
    const keep = this.pendingPrefill ? [[keepButton(this.pendingPrefill.dosage)]] : [];
    return { text: dosagePrompt(time), buttons: withCancel(keep) };
  }

  private confirmationPrompt(): OutboundMessage {
    return { text: draftSummary(this.draft.name ?? '', this.draft.entries), buttons: CONFIRMATION_KEYBOARD };
  }
}
