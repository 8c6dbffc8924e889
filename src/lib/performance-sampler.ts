import { countOnlinePlayers, insertPerformanceSample, type Db } from './db';
import { errorMessage, StorageError } from './errors';
import type { LogSource } from './journal-source';
import { scanLatestMetrics } from './log-parser';
import { childLogger, type Logger } from './logger';
import type { ProcessLocator, ResourceProbe, ResourceUsage } from './process-probe';
import { isoInstant, systemClock, type Clock } from './time';
import type { NewPerformanceSample } from './types';

export interface PerformanceSamplerDeps {
  db: Db;
  source: LogSource;
  locator: ProcessLocator;
  probe: ResourceProbe;
  clock?: Clock;
  logger?: Logger;
}

export interface SampleOptions {
  /** How many of the newest journal lines to rescan each tick. */
  logLines: number;
  timeoutMs: number;
}

/**
 * Resource usage of the server process, or null when it isn't running or
 * can't be inspected. Probe failures never fail the sample.
 */
async function readResourceUsage(
  locator: ProcessLocator,
  probe: ResourceProbe,
  log: Logger
): Promise<ResourceUsage | null> {
  try {
    const pid = await locator.resolve();
    if (pid === null) {
      log.debug('Server process not found');
      return null;
    }
    return await probe.sample(pid);
  } catch (err) {
    log.warn({ err: errorMessage(err) }, 'Resource probe failed');
    return null;
  }
}

/**
 * Build and store one performance sample: latest TPS / view radius from the
 * tail of the journal, CPU and memory from the process, and the current
 * online player count. Unknown values are stored as NULL, never as 0.
 *
 * A failed journal query rejects (the tick is skipped); a failed probe only
 * nulls the resource fields.
 */
export async function samplePerformance(
  deps: PerformanceSamplerDeps,
  options: SampleOptions
): Promise<NewPerformanceSample> {
  const { db, source, locator, probe } = deps;
  const clock = deps.clock ?? systemClock;
  const log = deps.logger ?? childLogger('performance');

  const lines = await source.query({ lines: options.logLines }, options.timeoutMs);
  const metrics = scanLatestMetrics(lines);
  const usage = await readResourceUsage(locator, probe, log);

  try {
    const sample: NewPerformanceSample = {
      timestamp: isoInstant(clock()),
      tps: metrics.tps,
      cpu_percent: usage ? usage.cpuPercent : null,
      ram_mb: usage ? usage.ramKb / 1024 : null,
      ram_percent: usage ? usage.ramPercent : null,
      view_radius: metrics.viewRadius,
      players_online: countOnlinePlayers(db),
    };
    insertPerformanceSample(db, sample);
    log.debug(sample, 'Recorded performance sample');
    return sample;
  } catch (err) {
    throw new StorageError('insert performance sample', err);
  }
}
