import { BUTTONS, TEXT, isCancel } from './messages.js';
import { finish, reply, type ConversationFlow, type FlowContext, type FlowStep } from './types.js';

const CONFIRM_KEYBOARD = [[BUTTONS.confirmDeleteAll], [BUTTONS.cancel]];
const FINAL_KEYBOARD = [[BUTTONS.confirmDeleteAllFinal], [BUTTONS.cancel]];

function medicineCount(count: number): string {
  return count === 1 ? '1 medicine' : `${count} medicines`;
}

/** Wipes every medicine of the user after two separate confirmations. */
export class DeleteAllFlow implements ConversationFlow {
  readonly name = 'delete-all';

  private stage: 'confirm' | 'final' = 'confirm';
  private count = 0;

  constructor(private readonly context: FlowContext) {}

  async start(): Promise<FlowStep> {
    const medicines = await this.context.medicines.listMedicines(this.context.userId);
    if (medicines.length === 0) {
      return finish({ text: TEXT.nothingToDelete });
    }
    this.count = medicines.length;
    return reply({
      text: `⚠️ This deletes ${medicineCount(this.count)} and every reminder for them. Are you sure?`,
      buttons: CONFIRM_KEYBOARD
    });
  }

  cancel(): FlowStep {
    return finish({ text: '↩️ Nothing was deleted.' });
  }

  async handle(input: string): Promise<FlowStep> {
    const text = input.trim();
    if (isCancel(text)) {
      return this.cancel();
    }

    if (this.stage === 'confirm') {
      if (text !== BUTTONS.confirmDeleteAll) {
        return reply({ text: TEXT.confirmChoice, buttons: CONFIRM_KEYBOARD });
      }
      this.stage = 'final';
      return reply({
        text: `🚨 Last check: ${medicineCount(this.count)} and their reminders will be gone for good. This cannot be undone.`,
        buttons: FINAL_KEYBOARD
      });
    }

    if (text !== BUTTONS.confirmDeleteAllFinal) {
      return reply({ text: TEXT.confirmChoice, buttons: FINAL_KEYBOARD });
    }
    const deleted = await this.context.medicines.removeAllMedicines(this.context.userId);
    return finish({ text: `🗑️ Deleted ${medicineCount(deleted)}.` });
  }
}
