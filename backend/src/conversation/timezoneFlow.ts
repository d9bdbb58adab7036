import { TEXT, isCancel, timezoneKeyboard, timezoneSaved } from './messages.js';
import { finish, reply, type ConversationFlow, type FlowContext, type FlowStep } from './types.js';

/** Moves every reminder of the user to a new zone; the engine re-arms them. */
export class TimezoneFlow implements ConversationFlow {
  readonly name = 'timezone';

  constructor(private readonly context: FlowContext) {}

  async start(): Promise<FlowStep> {
    const user = await this.context.medicines.findUser(this.context.userId);
    const current = user?.timezone ? `Current timezone: ${this.context.timezones.labelFor(user.timezone)}\n\n` : '';
    return reply({ text: `${current}${TEXT.chooseTimezone}`, buttons: this.keyboard() });
  }

  cancel(): FlowStep {
    return finish({ text: '↩️ Timezone unchanged.' });
  }

  async handle(input: string): Promise<FlowStep> {
    const text = input.trim();
    if (isCancel(text)) {
      return this.cancel();
    }
    const option = this.context.timezones.match(text);
    if (!option) {
      return reply({ text: TEXT.timezoneInvalid, buttons: this.keyboard() });
    }
    await this.context.medicines.changeTimezone(this.context.userId, option.timezone);
    return finish({ text: timezoneSaved(option.label) });
  }

  private keyboard(): string[][] {
    return timezoneKeyboard(this.context.timezones.options());
  }
}
