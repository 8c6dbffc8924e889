import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { MIGRATIONS, type Migration } from '@/db/schema';
import { utcInstant } from '@/lib/time';
import type {
  DbPerformanceSample,
  DbPlayer,
  DbPlayerEvent,
  NewPerformanceSample,
  PlayerEvent,
} from '@/lib/types';

export type Db = Database.Database;

const CHECKPOINT_KEY = 'last_event_ts';

/**
 * Open (creating if needed) the worker database and bring its schema up to
 * date. Safe to call on every start. Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);

  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('busy_timeout = 5000');

  runMigrations(db);

  return db;
}

export function runMigrations(db: Db): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const applied = new Set(
    (db.prepare('SELECT version FROM _migrations').all() as Array<{ version: number }>).map(
      (r) => r.version
    )
  );

  let count = 0;
  for (const migration of MIGRATIONS) {
    if (!applied.has(migration.version)) {
      db.transaction(() => {
        applyMigration(db, migration);
        db.prepare('INSERT INTO _migrations (version, name) VALUES (?, ?)').run(
          migration.version,
          migration.name
        );
      })();
      count++;
    }
  }
  return count;
}

export function applyMigration(db: Db, migration: Migration): void {
  if (migration.sql) db.exec(migration.sql);
  migration.up?.(db);
}

// ── Checkpoint ────────────────────────────────────────────────────────────

export function getCheckpoint(db: Db): string | null {
  const row = db.prepare('SELECT value FROM metadata WHERE key = ?').get(CHECKPOINT_KEY) as
    | { value: string | null }
    | undefined;
  return row?.value ?? null;
}

export function setCheckpoint(db: Db, timestamp: string): void {
  db.prepare(`
    INSERT INTO metadata (key, value) VALUES (?, ?)
    ON CONFLICT(key) DO UPDATE SET value = excluded.value
  `).run(CHECKPOINT_KEY, timestamp);
}

// ── Player writes ─────────────────────────────────────────────────────────

/**
 * Append an event to the history log. Returns false when the same event
 * (timestamp, player, type) is already recorded.
 */
export function appendPlayerEvent(db: Db, event: PlayerEvent): boolean {
  const info = db.prepare(`
    INSERT OR IGNORE INTO player_events (timestamp, occurred_at, uuid, name, event_type, world)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(
    event.timestamp,
    utcInstant(event.timestamp),
    event.playerId,
    event.name,
    event.kind,
    event.world
  );
  return info.changes > 0;
}

/** A join always wins: name, world and login time are overwritten. */
export function recordPlayerJoin(db: Db, event: PlayerEvent): void {
  db.prepare(`
    INSERT INTO players (uuid, name, online, last_login, world)
    VALUES (?, ?, 1, ?, ?)
    ON CONFLICT(uuid) DO UPDATE SET
      name = excluded.name,
      online = 1,
      last_login = excluded.last_login,
      world = excluded.world
  `).run(event.playerId, event.name, event.timestamp, event.world);
}

/** A finished session to add to a player's total, keyed by its login stamp. */
export interface SessionCredit {
  login: string;
  seconds: number;
}

/**
 * Mark a known player offline, crediting the session when one is given.
 * Returns false when the player has no record; a leave never creates one.
 */
export function recordPlayerLeave(
  db: Db,
  playerId: string,
  timestamp: string,
  credit: SessionCredit | null = null
): boolean {
  const info = db.prepare(`
    UPDATE players SET
      online = 0,
      last_logout = ?,
      total_playtime_seconds = total_playtime_seconds + ?,
      playtime_counted_login = COALESCE(?, playtime_counted_login)
    WHERE uuid = ?
  `).run(timestamp, credit?.seconds ?? 0, credit?.login ?? null, playerId);
  return info.changes > 0;
}

export interface PlayerSnapshot {
  uuid: string;
  name: string;
  online: boolean;
  lastLogin: string | null;
  lastLogout: string | null;
  world: string | null;
}

/**
 * Upsert folded player state. Non-null values win over nulls so a snapshot
 * never blanks a field that is already known.
 */
export function upsertPlayerSnapshots(db: Db, snapshots: PlayerSnapshot[]): number {
  const stmt = db.prepare(`
    INSERT INTO players (uuid, name, online, last_login, last_logout, world)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT(uuid) DO UPDATE SET
      name = excluded.name,
      online = excluded.online,
      last_login = COALESCE(excluded.last_login, players.last_login),
      last_logout = COALESCE(excluded.last_logout, players.last_logout),
      world = COALESCE(excluded.world, players.world)
  `);

  db.transaction(() => {
    for (const p of snapshots) {
      stmt.run(p.uuid, p.name, p.online ? 1 : 0, p.lastLogin, p.lastLogout, p.world);
    }
  })();

  return snapshots.length;
}

// ── Performance ───────────────────────────────────────────────────────────

export function insertPerformanceSample(db: Db, sample: NewPerformanceSample): number {
  const info = db.prepare(`
    INSERT INTO performance
      (timestamp, tps, cpu_percent, ram_mb, ram_percent, view_radius, players_online)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(
    sample.timestamp,
    sample.tps,
    sample.cpu_percent,
    sample.ram_mb,
    sample.ram_percent,
    sample.view_radius,
    sample.players_online
  );
  return Number(info.lastInsertRowid);
}

// ── Retention ─────────────────────────────────────────────────────────────

export function deletePerformanceBefore(db: Db, cutoff: string): number {
  return db.prepare('DELETE FROM performance WHERE timestamp < ?').run(cutoff).changes;
}

/** `cutoff` is a UTC ISO instant, compared against each event's occurred_at. */
export function deletePlayerEventsBefore(db: Db, cutoff: string): number {
  return db.prepare('DELETE FROM player_events WHERE occurred_at < ?').run(cutoff).changes;
}

/** Fold the WAL back into the main file so deleted pages can be reused. */
export function checkpointWal(db: Db): void {
  db.pragma('wal_checkpoint(TRUNCATE)');
}

// ── Reads ─────────────────────────────────────────────────────────────────

export function countOnlinePlayers(db: Db): number {
  const row = db.prepare('SELECT COUNT(*) AS count FROM players WHERE online = 1').get() as {
    count: number;
  };
  return row.count;
}

export function getPlayer(db: Db, uuid: string): DbPlayer | undefined {
  return db.prepare('SELECT * FROM players WHERE uuid = ?').get(uuid) as DbPlayer | undefined;
}

export function listPlayers(db: Db): DbPlayer[] {
  return db
    .prepare('SELECT * FROM players ORDER BY online DESC, name COLLATE NOCASE')
    .all() as DbPlayer[];
}

export function getRecentPlayerEvents(db: Db, limit = 50): DbPlayerEvent[] {
  return db
    .prepare('SELECT * FROM player_events ORDER BY occurred_at DESC, id DESC LIMIT ?')
    .all(limit) as DbPlayerEvent[];
}

export function getPerformanceSince(db: Db, since: string): DbPerformanceSample[] {
  return db
    .prepare('SELECT * FROM performance WHERE timestamp >= ? ORDER BY timestamp')
    .all(since) as DbPerformanceSample[];
}
