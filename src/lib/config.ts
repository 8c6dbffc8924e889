import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

// ── Environment schema ────────────────────────────────────────────────────
// Every knob has a default so the worker runs with no environment at all.

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  WORKER_DB_PATH: z.string().min(1).default(path.join('data', 'dashboard.db')),
  WORKER_SERVICE: z.string().min(1).default('hytale'),
  WORKER_PROCESS_NAME: z.string().min(1).default('java'),
  WORKER_PROCESS_MATCH: z.string().min(1).default('HytaleServer.jar'),
  WORKER_TICK_MS: positiveInt(1000),
  WORKER_PERF_INTERVAL_SECONDS: positiveInt(5),
  WORKER_PLAYER_INTERVAL_SECONDS: positiveInt(10),
  WORKER_CLEANUP_INTERVAL_SECONDS: positiveInt(3600),
  WORKER_PERF_RETENTION_HOURS: positiveInt(24),
  WORKER_EVENT_RETENTION_DAYS: positiveInt(7),
  WORKER_INGEST_LOOKBACK_DAYS: positiveInt(3),
  WORKER_BACKFILL_DAYS: positiveInt(7),
  WORKER_METRIC_LOG_LINES: positiveInt(200),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface WorkerConfig {
  dbPath: string;
  service: string;
  processName: string;
  processMatch: string;
  logLevel: string;
  tickMs: number;
  intervals: {
    performanceMs: number;
    playersMs: number;
    cleanupMs: number;
  };
  retention: {
    performanceMs: number;
    eventsMs: number;
  };
  ingestLookbackMs: number;
  backfillMs: number;
  metricLogLines: number;
  timeouts: {
    metricQueryMs: number;
    ingestQueryMs: number;
    backfillQueryMs: number;
    probeMs: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    throw new ConfigError(`Invalid ${issue.path.join('.')}: ${issue.message}`);
  }
  const e = parsed.data;

  return {
    dbPath: path.resolve(e.WORKER_DB_PATH),
    service: e.WORKER_SERVICE,
    processName: e.WORKER_PROCESS_NAME,
    processMatch: e.WORKER_PROCESS_MATCH,
    logLevel: e.LOG_LEVEL,
    tickMs: e.WORKER_TICK_MS,
    intervals: {
      performanceMs: e.WORKER_PERF_INTERVAL_SECONDS * 1000,
      playersMs: e.WORKER_PLAYER_INTERVAL_SECONDS * 1000,
      cleanupMs: e.WORKER_CLEANUP_INTERVAL_SECONDS * 1000,
    },
    retention: {
      performanceMs: e.WORKER_PERF_RETENTION_HOURS * HOUR_MS,
      eventsMs: e.WORKER_EVENT_RETENTION_DAYS * DAY_MS,
    },
    ingestLookbackMs: e.WORKER_INGEST_LOOKBACK_DAYS * DAY_MS,
    backfillMs: e.WORKER_BACKFILL_DAYS * DAY_MS,
    metricLogLines: e.WORKER_METRIC_LOG_LINES,
    timeouts: {
      metricQueryMs: 10_000,
      ingestQueryMs: 30_000,
      backfillQueryMs: 60_000,
      probeMs: 10_000,
    },
  };
}
