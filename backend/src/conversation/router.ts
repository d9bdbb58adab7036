import type { InboundEvent, OutboundMessage } from '@dosebell/shared';
import type { TimezoneCatalog } from '../config/timezones.js';
import * as medicineService from '../services/medicineService.js';
import { StorageError, describeError } from '../utils/errors.js';
import { KeyedLock } from '../utils/keyedLock.js';
import { createLogger } from '../utils/logger.js';
import { incrementMetric } from '../utils/metrics.js';
import { DeleteAllFlow } from './deleteAllFlow.js';
import { EntryFlow } from './entryFlow.js';
import { ManageFlow } from './manageFlow.js';
import { BUTTONS, COMMANDS, MAIN_MENU, TEXT, formatMedicineList, isCancel, mainMenu } from './messages.js';
import { TimezoneFlow } from './timezoneFlow.js';
import type { ConversationFlow, FlowContext, FlowStep, MedicineOperations } from './types.js';

const log = createLogger('Conversation');

export interface AccessCheck {
  isAuthorized(userId: number, username?: string | null): Promise<boolean>;
}

export interface ConversationRouterOptions {
  gate: AccessCheck;
  timezones: TimezoneCatalog;
  medicines?: MedicineOperations;
}

/**
 * Entry point for every inbound message. Checks access, then hands the text
 * to the user's active flow or to the main menu. Messages from one user are
 * processed strictly in order.
 */
export class ConversationRouter {
  private readonly gate: AccessCheck;
  private readonly timezones: TimezoneCatalog;
  private readonly medicines: MedicineOperations;
  private readonly sessions = new Map<number, ConversationFlow>();
  private readonly lock = new KeyedLock<number>();

  constructor(options: ConversationRouterOptions) {
    this.gate = options.gate;
    this.timezones = options.timezones;
    this.medicines = options.medicines ?? medicineService;
  }

  handle(event: InboundEvent): Promise<OutboundMessage[]> {
    return this.lock.run(event.userId, () => this.process(event));
  }

  /** The flow a user is in, if any. */
  sessionFor(userId: number): ConversationFlow | undefined {
    return this.sessions.get(userId);
  }

  activeSessions(): number {
    return this.sessions.size;
  }

  private async process(event: InboundEvent): Promise<OutboundMessage[]> {
    if (!(await this.gate.isAuthorized(event.userId, event.username))) {
      // Someone dropped from the allow-list mid-flow loses the flow too.
      this.sessions.delete(event.userId);
      return [{ text: TEXT.accessDenied, removeKeyboard: true }];
    }

    incrementMetric('conversation.message');
    try {
      return await this.route(event, event.text.trim());
    } catch (error) {
      if (error instanceof StorageError) {
        incrementMetric('conversation.storage_error');
        log.error('Storage failure while handling message', { userId: event.userId, error: error.message });
        return [{ text: TEXT.storageError }];
      }
      log.error('Unexpected failure while handling message', { userId: event.userId, error: describeError(error) });
      this.sessions.delete(event.userId);
      return [mainMenu(TEXT.unexpectedError)];
    }
  }

  private async route(event: InboundEvent, text: string): Promise<OutboundMessage[]> {
    const { userId } = event;
    const session = this.sessions.get(userId);

    if (isCancel(text)) {
      return session ? this.apply(userId, session, session.cancel()) : [mainMenu(TEXT.nothingToCancel)];
    }
    if (text === COMMANDS.help || text === BUTTONS.help) {
      return session ? [{ text: TEXT.help }] : [mainMenu(TEXT.help)];
    }
    if (text === COMMANDS.start) {
      this.sessions.delete(userId);
    } else if (session) {
      return this.apply(userId, session, await session.handle(text));
    }

    const context = this.contextFor(event);
    const user = await this.medicines.findUser(userId);
    if (!user?.timezone) {
      return this.begin(userId, EntryFlow.onboarding(context));
    }

    switch (text) {
      case COMMANDS.start:
        return [mainMenu(TEXT.welcomeBack)];
      case BUTTONS.addMedicine:
        return this.begin(userId, EntryFlow.newMedicine(context));
      case BUTTONS.myMedicines: {
        const medicines = await this.medicines.listMedicines(userId);
        return [mainMenu(formatMedicineList(medicines, this.timezones.labelFor(user.timezone)))];
      }
      case BUTTONS.manage:
        return this.begin(userId, new ManageFlow(context));
      case BUTTONS.deleteAll:
        return this.begin(userId, new DeleteAllFlow(context));
      case BUTTONS.changeTimezone:
        return this.begin(userId, new TimezoneFlow(context));
      default:
        return [mainMenu(TEXT.unknownCommand)];
    }
  }

  private contextFor(event: InboundEvent): FlowContext {
    return {
      userId: event.userId,
      username: event.username,
      timezones: this.timezones,
      medicines: this.medicines
    };
  }

  private async begin(userId: number, flow: ConversationFlow): Promise<OutboundMessage[]> {
    log.debug('Flow started', { userId, flow: flow.name });
    return this.apply(userId, flow, await flow.start());
  }

  private async apply(userId: number, flow: ConversationFlow, step: FlowStep): Promise<OutboundMessage[]> {
    if (step.next) {
      return [...step.replies, ...(await this.begin(userId, step.next))];
    }
    if (step.done) {
      this.sessions.delete(userId);
      log.debug('Flow finished', { userId, flow: flow.name });
      return withMainMenu(step.replies);
    }
    this.sessions.set(userId, flow);
    return step.replies;
  }
}

function withMainMenu(replies: OutboundMessage[]): OutboundMessage[] {
  const last = replies[replies.length - 1];
  if (!last) {
    return [mainMenu(TEXT.menuPrompt)];
  }
  return [...replies.slice(0, -1), { ...last, buttons: MAIN_MENU }];
}
