/**
 * Server telemetry worker.
 *
 * Collects performance samples and player join/leave events from the game
 * server's journal and keeps them in SQLite for fast dashboard reads.
 * Run as a systemd service; SIGTERM / SIGINT trigger a graceful shutdown.
 */

import 'dotenv/config';
import { loadConfig } from '@/lib/config';
import { openDatabase, type Db } from '@/lib/db';
import { errorMessage } from '@/lib/errors';
import { JournalLogSource } from '@/lib/journal-source';
import { childLogger, logger } from '@/lib/logger';
import { samplePerformance } from '@/lib/performance-sampler';
import { backfillPlayers, syncPlayerEvents } from '@/lib/player-sync';
import { PsResourceProbe, SystemdProcessLocator } from '@/lib/process-probe';
import { pruneOldData } from '@/lib/retention';
import { Scheduler } from '@/lib/scheduler';

async function main(): Promise<number> {
  const config = loadConfig();
  logger.level = config.logLevel;
  const log = childLogger('worker');

  const controller = new AbortController();
  for (const sig of ['SIGTERM', 'SIGINT'] as const) {
    process.once(sig, () => {
      log.info(`Received ${sig}, shutting down...`);
      controller.abort();
    });
  }

  let db: Db | null = null;
  const database = (): Db => {
    if (!db) throw new Error('Database is not open');
    return db;
  };

  const source = new JournalLogSource(config.service);
  const locator = new SystemdProcessLocator({
    service: config.service,
    processName: config.processName,
    processMatch: config.processMatch,
    timeoutMs: config.timeouts.probeMs,
  });
  const probe = new PsResourceProbe(config.timeouts.probeMs);

  const scheduler = new Scheduler({
    tickMs: config.tickMs,
    signal: controller.signal,
    setup: () => {
      db = openDatabase(config.dbPath);
      log.info(`Database initialized: ${config.dbPath}`);
    },
    backfill: () =>
      backfillPlayers(
        { db: database(), source },
        { windowMs: config.backfillMs, timeoutMs: config.timeouts.backfillQueryMs }
      ),
    teardown: () => {
      db?.close();
      db = null;
    },
    tasks: [
      {
        name: 'performance',
        intervalMs: config.intervals.performanceMs,
        run: () =>
          samplePerformance(
            { db: database(), source, locator, probe },
            { logLines: config.metricLogLines, timeoutMs: config.timeouts.metricQueryMs }
          ),
      },
      {
        name: 'players',
        intervalMs: config.intervals.playersMs,
        run: () =>
          syncPlayerEvents(
            { db: database(), source },
            { lookbackMs: config.ingestLookbackMs, timeoutMs: config.timeouts.ingestQueryMs }
          ),
      },
      {
        name: 'cleanup',
        intervalMs: config.intervals.cleanupMs,
        run: () => pruneOldData(database(), config.retention),
      },
    ],
  });

  log.info({ service: config.service }, 'Starting server telemetry worker...');

  try {
    await scheduler.run();
  } catch (err) {
    log.fatal({ err: errorMessage(err) }, 'Could not open the database');
    return 1;
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.fatal({ err: errorMessage(err) }, 'Worker failed to start');
    process.exitCode = 1;
  }
);
