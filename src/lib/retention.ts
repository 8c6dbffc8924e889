import { checkpointWal, deletePerformanceBefore, deletePlayerEventsBefore, type Db } from './db';
import { errorMessage, StorageError } from './errors';
import { childLogger, type Logger } from './logger';
import { isoInstant, systemClock, type Clock } from './time';
import type { PruneResult } from './types';

export interface RetentionPolicy {
  performanceMs: number;
  eventsMs: number;
}

/**
 * Delete performance samples and event history older than their horizons.
 * Cutoffs are UTC ISO instants taken from the clock, compared as text against
 * the sample timestamps and each event's stored UTC instant.
 */
export function pruneOldData(
  db: Db,
  policy: RetentionPolicy,
  clock: Clock = systemClock,
  log: Logger = childLogger('retention')
): PruneResult {
  const now = clock();
  let result: PruneResult;

  try {
    result = {
      performanceDeleted: deletePerformanceBefore(db, isoInstant(now - policy.performanceMs)),
      eventsDeleted: deletePlayerEventsBefore(db, isoInstant(now - policy.eventsMs)),
    };
  } catch (err) {
    throw new StorageError('prune old data', err);
  }

  if (result.performanceDeleted === 0 && result.eventsDeleted === 0) return result;

  log.info(
    result,
    `Cleanup: removed ${result.performanceDeleted} perf records, ${result.eventsDeleted} events`
  );

  try {
    checkpointWal(db);
  } catch (err) {
    log.warn({ err: errorMessage(err) }, 'WAL checkpoint after cleanup failed');
  }

  return result;
}
