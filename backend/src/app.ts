import express, { type Express, type Request, type Response } from 'express';
import type { ReminderEngineStatus } from '@dosebell/shared';
import { metricsSnapshot } from './utils/metrics.js';

export interface HealthSources {
  engine: { status(): ReminderEngineStatus };
  conversations: { activeSessions(): number };
}

/** Small HTTP surface for the process supervisor: liveness and engine state. */
export function createApp({ engine, conversations }: HealthSources): Express {
  const app = express();

  app.get('/', (_req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'Dosebell reminder bot is running' });
  });

  app.get('/health', (_req: Request, res: Response) => {
    const status = engine.status();
    res.status(status.running ? 200 : 503).json({
      status: status.running ? 'ok' : 'degraded',
      engine: status,
      activeSessions: conversations.activeSessions()
    });
  });

  app.get('/metrics', (_req: Request, res: Response) => {
    res.json(metricsSnapshot());
  });

  return app;
}
