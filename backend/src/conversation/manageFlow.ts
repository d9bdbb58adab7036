import type { MedicineWithReminders, OutboundMessage, Reminder } from '@dosebell/shared';
import { EntryFlow } from './entryFlow.js';
import { BUTTONS, TEXT, isCancel, medicineDetails, withCancel } from './messages.js';
import { finish, reply, type ConversationFlow, type FlowContext, type FlowStep } from './types.js';

type ManageState =
  | { kind: 'choosing-medicine'; choices: Map<string, number> }
  | { kind: 'choosing-action'; medicine: MedicineWithReminders }
  | { kind: 'confirming-medicine-delete'; medicine: MedicineWithReminders }
  | { kind: 'confirming-reminder-delete'; medicine: MedicineWithReminders; reminder: Reminder };

const pauseButton = (time: string) => `⏸ Pause ${time}`;
const resumeButton = (time: string) => `▶️ Resume ${time}`;
const removeButton = (time: string) => `❌ Remove ${time}`;

/**
 * Pick a medicine, then edit it, delete it, or pause/resume/remove one of its
 * times. Deletions ask for confirmation first.
 */
export class ManageFlow implements ConversationFlow {
  readonly name = 'manage';

  private state: ManageState = { kind: 'choosing-medicine', choices: new Map() };

  constructor(private readonly context: FlowContext) {}

  start(): Promise<FlowStep> {
    return this.showMedicines();
  }

  cancel(): FlowStep {
    return finish({ text: '↩️ Back to the menu.' });
  }

  async handle(input: string): Promise<FlowStep> {
    const text = input.trim();
    if (isCancel(text)) {
      return this.cancel();
    }

    const state = this.state;
    switch (state.kind) {
      case 'choosing-medicine':
        return this.handleMedicineChoice(text, state.choices);
      case 'choosing-action':
        return this.handleAction(text, state.medicine);
      case 'confirming-medicine-delete':
        return this.handleMedicineDelete(text, state.medicine);
      case 'confirming-reminder-delete':
        return this.handleReminderDelete(text, state.medicine, state.reminder);
    }
  }

  private async showMedicines(...before: OutboundMessage[]): Promise<FlowStep> {
    const medicines = await this.context.medicines.listMedicines(this.context.userId);
    if (medicines.length === 0) {
      return finish(...before, { text: TEXT.noMedicines });
    }

    const choices = new Map<string, number>();
    medicines.forEach((medicine, index) => {
      choices.set(`${index + 1}. ${medicine.name}`, medicine.id);
    });
    this.state = { kind: 'choosing-medicine', choices };
    return reply(...before, {
      text: TEXT.chooseMedicine,
      buttons: withCancel([...choices.keys()].map((label) => [label]))
    });
  }

  private async handleMedicineChoice(text: string, choices: Map<string, number>): Promise<FlowStep> {
    const medicineId = choices.get(text);
    if (medicineId === undefined) {
      return reply({
        text: TEXT.confirmChoice,
        buttons: withCancel([...choices.keys()].map((label) => [label]))
      });
    }
    return this.showActions(medicineId);
  }

  private async showActions(medicineId: number, ...before: OutboundMessage[]): Promise<FlowStep> {
    const medicine = await this.context.medicines.getMedicine(medicineId, this.context.userId);
    if (!medicine) {
      return this.showMedicines(...before, { text: TEXT.medicineGone });
    }
    this.state = { kind: 'choosing-action', medicine };
    return reply(...before, this.actionsPrompt(medicine));
  }

  private actionsPrompt(medicine: MedicineWithReminders): OutboundMessage {
    // A medicine keeps at least one time; the last one goes with the medicine itself.
    const canRemoveTimes = medicine.reminders.length > 1;
    const reminderRows = medicine.reminders.map((reminder) => {
      const toggle = reminder.active ? pauseButton(reminder.time) : resumeButton(reminder.time);
      return canRemoveTimes ? [toggle, removeButton(reminder.time)] : [toggle];
    });
    return {
      text: medicineDetails(medicine),
      buttons: [
        [BUTTONS.edit, BUTTONS.deleteMedicine],
        ...reminderRows,
        [BUTTONS.back, BUTTONS.cancel]
      ]
    };
  }

  private async handleAction(text: string, medicine: MedicineWithReminders): Promise<FlowStep> {
    if (text === BUTTONS.back) {
      return this.showMedicines();
    }
    if (text === BUTTONS.edit) {
      return { replies: [], done: false, next: EntryFlow.editMedicine(this.context, medicine) };
    }
    if (text === BUTTONS.deleteMedicine) {
      this.state = { kind: 'confirming-medicine-delete', medicine };
      return reply({
        text: `🗑️ Delete ${medicine.name} and all of its reminders?`,
        buttons: [[BUTTONS.confirmDelete], [BUTTONS.back, BUTTONS.cancel]]
      });
    }

    for (const reminder of medicine.reminders) {
      if (text === pauseButton(reminder.time) || text === resumeButton(reminder.time)) {
        const pause = text === pauseButton(reminder.time);
        const updated = await this.context.medicines.setReminderPaused(reminder.id, this.context.userId, pause);
        const notice = updated
          ? `${pause ? '⏸ Paused' : '▶️ Resumed'} ${reminder.time}.`
          : TEXT.medicineGone;
        return this.showActions(medicine.id, { text: notice });
      }
      if (medicine.reminders.length > 1 && text === removeButton(reminder.time)) {
        this.state = { kind: 'confirming-reminder-delete', medicine, reminder };
        return reply({
          text: `🗑️ Remove the ${reminder.time} reminder for ${medicine.name}?`,
          buttons: [[BUTTONS.confirmDelete], [BUTTONS.back, BUTTONS.cancel]]
        });
      }
    }

    return reply({ text: TEXT.confirmChoice }, this.actionsPrompt(medicine));
  }

  private async handleMedicineDelete(text: string, medicine: MedicineWithReminders): Promise<FlowStep> {
    if (text === BUTTONS.back) {
      return this.showActions(medicine.id);
    }
    if (text !== BUTTONS.confirmDelete) {
      return reply({ text: TEXT.confirmChoice, buttons: [[BUTTONS.confirmDelete], [BUTTONS.back, BUTTONS.cancel]] });
    }
    const removed = await this.context.medicines.removeMedicine(medicine.id, this.context.userId);
    return finish({ text: removed ? `🗑️ ${medicine.name} deleted.` : TEXT.medicineGone });
  }

  private async handleReminderDelete(
    text: string,
    medicine: MedicineWithReminders,
    reminder: Reminder
  ): Promise<FlowStep> {
    if (text === BUTTONS.back) {
      return this.showActions(medicine.id);
    }
    if (text !== BUTTONS.confirmDelete) {
      return reply({ text: TEXT.confirmChoice, buttons: [[BUTTONS.confirmDelete], [BUTTONS.back, BUTTONS.cancel]] });
    }
    const removed = await this.context.medicines.removeReminder(reminder.id, this.context.userId);
    return this.showActions(medicine.id, { text: removed ? `🗑️ Removed ${reminder.time}.` : TEXT.medicineGone });
  }
}
