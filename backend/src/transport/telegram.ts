import { Markup, Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import type { InboundEvent, OutboundMessage } from '@dosebell/shared';
import type { Notifier } from '../services/deliveryDispatcher.js';
import { describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { incrementMetric } from '../utils/metrics.js';

const log = createLogger('Telegram');

export interface MessageHandler {
  handle(event: InboundEvent): Promise<OutboundMessage[]>;
}

/** Reply keyboard markup for one outbound message; empty leaves the user's keyboard alone. */
export function replyExtra(outbound: OutboundMessage) {
  if (outbound.removeKeyboard) {
    return Markup.removeKeyboard();
  }
  if (outbound.buttons && outbound.buttons.length > 0) {
    return Markup.keyboard(outbound.buttons).resize();
  }
  return {};
}

export type ReplyExtra = ReturnType<typeof replyExtra>;

export interface MessageSender {
  sendMessage(chatId: number, text: string, extra: ReplyExtra): Promise<unknown>;
}

/**
 * Runs one inbound text through the handler and sends every reply in order.
 */
export async function relay(
  handler: MessageHandler,
  event: InboundEvent,
  send: (text: string, extra: ReplyExtra) => Promise<unknown>
): Promise<void> {
  const replies = await handler.handle(event);
  for (const outbound of replies) {
    await send(outbound.text, replyExtra(outbound));
  }
}

export class TelegramNotifier implements Notifier {
  constructor(private readonly sender: MessageSender) {}

  async send(userId: number, outbound: OutboundMessage): Promise<void> {
    await this.sender.sendMessage(userId, outbound.text, replyExtra(outbound));
  }
}

export function createTelegramBot(token: string, handler: MessageHandler): Telegraf {
  const bot = new Telegraf(token);

  bot.on(message('text'), async (ctx) => {
    if (ctx.chat.type !== 'private') {
      return;
    }
    const event: InboundEvent = {
      userId: ctx.from.id,
      username: ctx.from.username ?? null,
      text: ctx.message.text
    };
    await relay(handler, event, (text, extra) => ctx.reply(text, extra));
  });

  bot.catch((error, ctx) => {
    incrementMetric('telegram.update_failed');
    log.error('Failed to handle update', { updateId: ctx.update.update_id, error: describeError(error) });
  });

  return bot;
}
