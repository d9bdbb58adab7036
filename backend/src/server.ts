// Load environment variables FIRST
import './env.js';

// Now import everything else
import type { Server } from 'http';
import { createApp } from './app.js';
import { loadSettings } from './config/settings.js';
import { loadTimezoneCatalog } from './config/timezones.js';
import { ConversationRouter } from './conversation/router.js';
import { bootstrapDatabase } from './db/bootstrap.js';
import { end as closeDatabase } from './db/client.js';
import { AccessGate } from './services/accessGate.js';
import { DeliveryDispatcher } from './services/deliveryDispatcher.js';
import { ReminderEngine } from './services/reminderEngine.js';
import { reminderEventBus } from './services/reminderEvents.js';
import { TelegramNotifier, createTelegramBot } from './transport/telegram.js';
import { describeError } from './utils/errors.js';
import { createLogger } from './utils/logger.js';
import { flushMetrics } from './utils/metrics.js';

const log = createLogger('Server');

let server: Server | null = null;
let shuttingDown = false;

const settings = loadSettings();

await bootstrapDatabase();
const timezones = await loadTimezoneCatalog(settings.timezonesPath);

const gate = new AccessGate({ path: settings.accessListPath, ttlMs: settings.accessListTtlMs });
const router = new ConversationRouter({ gate, timezones });
const bot = createTelegramBot(settings.telegramBotToken, router);

const engine = new ReminderEngine({
  dispatcher: new DeliveryDispatcher(new TelegramNotifier(bot.telegram)),
  graceMinutes: settings.reminderGraceMinutes,
  resyncIntervalMs: settings.reminderResyncIntervalMs,
  retryDelayMs: settings.reminderRetryDelayMs,
  onFatal: (error) => {
    log.error('Reminder engine stopped on corrupt data', { error: error.message, details: error.details });
    void shutdown('engine-fatal', 1);
  }
});
engine.attach(reminderEventBus);
await engine.start();

const app = createApp({ engine, conversations: router });
server = app.listen(settings.port, '0.0.0.0', () => {
  log.info(`Health endpoint on http://localhost:${settings.port}/health`);
});

bot.launch().catch((error: unknown) => {
  log.error('Telegram polling stopped', { error: describeError(error) });
  void shutdown('telegram', 1);
});
log.info('Bot started');

async function shutdown(reason: string, exitCode = 0): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info('Shutting down', { reason });
  try {
    bot.stop(reason);
  } catch (error) {
    // Telegraf throws when polling never started.
    log.warn('Bot was not running', { error: describeError(error) });
  }
  try {
    await engine.stop();
    const listening = server;
    if (listening) {
      await new Promise<void>((resolve) => listening.close(() => resolve()));
    }
    await closeDatabase();
  } catch (error) {
    log.error('Shutdown did not finish cleanly', { error: describeError(error) });
    exitCode = 1;
  }
  flushMetrics('manual');
  process.exit(exitCode);
}

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));
