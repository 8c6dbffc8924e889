/**
 * Player sync — turns journal join/leave lines into player state.
 *
 * Data flow:
 *   Scheduler (startup) → backfillPlayers()  → wide window, folded snapshot upsert
 *   Scheduler (every N s) → syncPlayerEvents() → checkpoint window → mergePlayerEvents()
 *
 * Delivery is at-least-once: journalctl's --since is inclusive and a crash can
 * land between merging and moving the checkpoint. Presence updates are
 * idempotent and replay in source order; playtime is only added for events the
 * history log has not seen, once per login.
 */

import {
  appendPlayerEvent,
  getCheckpoint,
  getPlayer,
  recordPlayerJoin,
  recordPlayerLeave,
  setCheckpoint,
  upsertPlayerSnapshots,
  type Db,
  type PlayerSnapshot,
  type SessionCredit,
} from './db';
import { StorageError } from './errors';
import type { LogSource } from './journal-source';
import { DEFAULT_EVENT_PATTERNS, parsePlayerEvents, type EventPattern } from './log-parser';
import { childLogger, type Logger } from './logger';
import { isoInstant, parseLogTimestamp, systemClock, type Clock } from './time';
import type { DbPlayer, PlayerEvent, SyncResult } from './types';

export interface PlayerSyncDeps {
  db: Db;
  source: LogSource;
  clock?: Clock;
  logger?: Logger;
  patterns?: readonly EventPattern[];
}

// ── Merge ────────────────────────────────────────────────────────────────────

/** Whole seconds between login and logout; 0 when either stamp is unusable. */
export function sessionSeconds(login: string | null, logout: string): number {
  if (!login) return 0;
  const start = parseLogTimestamp(login);
  const end = parseLogTimestamp(logout);
  if (start === null || end === null) return 0;
  return Math.max(0, Math.round((end - start) / 1000));
}

/**
 * The session a leave closes, if it has not been credited yet. Keyed on the
 * stored login rather than the online flag: the startup backfill may already
 * have marked the player offline.
 */
export function uncreditedSession(player: DbPlayer, leave: string): SessionCredit | null {
  const login = player.last_login;
  if (!login || login === player.playtime_counted_login) return null;

  const start = parseLogTimestamp(login);
  const end = parseLogTimestamp(leave);
  if (start === null || end === null || end < start) return null;

  return { login, seconds: sessionSeconds(login, leave) };
}

/**
 * Merge events into player state in the order given. Each event is applied in
 * its own transaction: the history row, then the player row. Returns how many
 * events were new.
 */
export function mergePlayerEvents(db: Db, events: readonly PlayerEvent[]): number {
  const applyEvent = db.transaction((event: PlayerEvent): boolean => {
    const isNew = appendPlayerEvent(db, event);

    if (event.kind === 'join') {
      recordPlayerJoin(db, event);
      return isNew;
    }

    // Leave for a player we have never seen: history only, no record
    const player = getPlayer(db, event.playerId);
    if (!player) return isNew;

    const credit = isNew ? uncreditedSession(player, event.timestamp) : null;
    recordPlayerLeave(db, event.playerId, event.timestamp, credit);
    return isNew;
  });

  let applied = 0;
  for (const event of events) {
    try {
      if (applyEvent(event)) applied++;
    } catch (err) {
      throw new StorageError(`merge ${event.kind} for ${event.playerId}`, err);
    }
  }
  return applied;
}

// ── Incremental sync ─────────────────────────────────────────────────────────

export interface SyncOptions {
  /** How far back to read when no checkpoint has been stored yet. */
  lookbackMs: number;
  timeoutMs: number;
}

/**
 * Read the journal from the stored checkpoint, merge what it contains and
 * move the checkpoint to the last event's timestamp (source order, not
 * sorted). An empty window leaves the checkpoint alone.
 */
export async function syncPlayerEvents(deps: PlayerSyncDeps, options: SyncOptions): Promise<SyncResult> {
  const { db, source } = deps;
  const clock = deps.clock ?? systemClock;
  const log = deps.logger ?? childLogger('player-sync');

  const stored = getCheckpoint(db);
  const since = stored ?? isoInstant(clock() - options.lookbackMs);

  const lines = await source.query({ since }, options.timeoutMs);
  const events = parsePlayerEvents(lines, deps.patterns ?? DEFAULT_EVENT_PATTERNS);

  if (events.length === 0) {
    log.debug({ since, lines: lines.length }, 'No player events in window');
    return { events: 0, applied: 0, checkpoint: stored };
  }

  const applied = mergePlayerEvents(db, events);
  const checkpoint = events[events.length - 1].timestamp;

  try {
    setCheckpoint(db, checkpoint);
  } catch (err) {
    throw new StorageError('advance checkpoint', err);
  }

  if (applied > 0) {
    log.info({ events: events.length, applied, checkpoint }, `Processed ${applied} player events`);
  }

  return { events: events.length, applied, checkpoint };
}

// ── Startup backfill ─────────────────────────────────────────────────────────

/**
 * Fold events into one snapshot per player. Joins set presence, login time,
 * world and name; leaves set presence and logout time. Nothing is ever set
 * back to null.
 */
export function foldPlayerSnapshots(events: readonly PlayerEvent[]): PlayerSnapshot[] {
  const players = new Map<string, PlayerSnapshot>();

  for (const event of events) {
    let snapshot = players.get(event.playerId);
    if (!snapshot) {
      snapshot = {
        uuid: event.playerId,
        name: event.name,
        online: false,
        lastLogin: null,
        lastLogout: null,
        world: null,
      };
      players.set(event.playerId, snapshot);
    }

    if (event.kind === 'join') {
      snapshot.online = true;
      snapshot.lastLogin = event.timestamp;
      snapshot.world = event.world ?? snapshot.world;
      snapshot.name = event.name;
    } else {
      snapshot.online = false;
      snapshot.lastLogout = event.timestamp;
    }
  }

  return Array.from(players.values());
}

export interface BackfillOptions {
  windowMs: number;
  timeoutMs: number;
}

/**
 * One-time wide scan at startup so presence is right before the first
 * incremental sync. Does not touch the event log, the checkpoint or playtime.
 */
export async function backfillPlayers(deps: PlayerSyncDeps, options: BackfillOptions): Promise<number> {
  const { db, source } = deps;
  const clock = deps.clock ?? systemClock;
  const log = deps.logger ?? childLogger('player-sync');

  log.info('Initial player sync from journal...');
  const lines = await source.query({ since: isoInstant(clock() - options.windowMs) }, options.timeoutMs);
  const snapshots = foldPlayerSnapshots(parsePlayerEvents(lines, deps.patterns ?? DEFAULT_EVENT_PATTERNS));

  try {
    upsertPlayerSnapshots(db, snapshots);
  } catch (err) {
    throw new StorageError('backfill players', err);
  }

  log.info({ players: snapshots.length }, `Synced ${snapshots.length} players`);
  return snapshots.length;
}
