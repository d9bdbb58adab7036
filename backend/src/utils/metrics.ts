import { createLogger } from './logger.js';

type MetricTags = Record<string, string | number | boolean>;

const log = createLogger('Metrics');
const counters = new Map<string, number>();

let flushTimer: NodeJS.Timeout | null = null;

function flushIntervalMs(): number {
  const parsed = Number.parseInt(process.env.METRICS_FLUSH_INTERVAL_MS ?? '300000', 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

function metricKey(name: string, tags?: MetricTags): string {
  if (!tags || Object.keys(tags).length === 0) {
    return name;
  }
  const serialized = Object.entries(tags)
    .map(([key, value]) => `${key}=${String(value)}`)
    .sort()
    .join(',');
  return `${name}|${serialized}`;
}

function ensureFlushTimer(): void {
  const intervalMs = flushIntervalMs();
  if (flushTimer || intervalMs <= 0) {
    return;
  }

  flushTimer = setInterval(() => flushMetrics('interval'), intervalMs);
  flushTimer.unref();
}

export function incrementMetric(name: string, value = 1, tags?: MetricTags): void {
  const key = metricKey(name, tags);
  counters.set(key, (counters.get(key) ?? 0) + value);
  ensureFlushTimer();
}

export function metricsSnapshot(): Record<string, number> {
  return Object.fromEntries(counters.entries());
}

export function flushMetrics(reason: 'interval' | 'manual' = 'manual'): void {
  if (counters.size === 0) {
    return;
  }
  const payload = Array.from(counters.entries()).map(([key, value]) => ({ key, value }));
  log.info(`Flush counters (${reason})`, payload);
  counters.clear();
}

export function __resetMetricsForTests(): void {
  counters.clear();
  if (flushTimer) {
    clearInterval(flushTimer);
    flushTimer = null;
  }
}
