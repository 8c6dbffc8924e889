import type Database from 'better-sqlite3';
import { utcInstant } from '@/lib/time';

/**
 * A schema step. `sql` runs first, then `up` for steps that have to look at
 * the existing schema or rewrite rows before they can change anything.
 */
export interface Migration {
  version: number;
  name: string;
  sql?: string;
  up?: (db: Database.Database) => void;
}

function hasColumn(db: Database.Database, table: string, column: string): boolean {
  const columns = db.pragma(`table_info(${table})`) as Array<{ name: string }>;
  return columns.some((c) => c.name === column);
}

// Databases written by the earlier worker already carry some of these columns
function addColumnIfMissing(
  db: Database.Database,
  table: string,
  column: string,
  definition: string
): void {
  if (!hasColumn(db, table, column)) {
    db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
  }
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    sql: `
      CREATE TABLE IF NOT EXISTS players (
        uuid TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        online INTEGER NOT NULL DEFAULT 0,
        last_login TEXT,
        last_logout TEXT,
        world TEXT,
        total_playtime_seconds INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS performance (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        tps INTEGER,
        cpu_percent REAL,
        ram_mb REAL,
        ram_percent REAL,
        players_online INTEGER NOT NULL DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_perf_ts ON performance(timestamp);

      CREATE TABLE IF NOT EXISTS player_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        uuid TEXT NOT NULL,
        name TEXT NOT NULL,
        event_type TEXT NOT NULL CHECK (event_type IN ('join', 'leave')),
        world TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_events_ts ON player_events(timestamp);

      CREATE TABLE IF NOT EXISTS metadata (
        key TEXT PRIMARY KEY,
        value TEXT
      );
    `,
  },
  {
    version: 2,
    name: 'performance_view_radius',
    up: (db) => addColumnIfMissing(db, 'performance', 'view_radius', 'INTEGER'),
  },
  {
    version: 3,
    name: 'player_events_dedupe',
    sql: `
      DELETE FROM player_events
      WHERE id NOT IN (
        SELECT MIN(id) FROM player_events GROUP BY timestamp, uuid, event_type
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_events_unique
        ON player_events(timestamp, uuid, event_type);
    `,
  },
  {
    version: 4,
    name: 'players_online_index',
    sql: `
      CREATE INDEX IF NOT EXISTS idx_players_online ON players(online);
    `,
  },
  {
    version: 5,
    name: 'player_events_occurred_at',
    // Retention ages events by this UTC instant
    up: (db) => {
      addColumnIfMissing(db, 'player_events', 'occurred_at', 'TEXT');

      const rows = db
        .prepare('SELECT id, timestamp FROM player_events WHERE occurred_at IS NULL')
        .all() as Array<{ id: number; timestamp: string }>;
      const update = db.prepare('UPDATE player_events SET occurred_at = ? WHERE id = ?');
      for (const row of rows) {
        update.run(utcInstant(row.timestamp), row.id);
      }

      db.exec('CREATE INDEX IF NOT EXISTS idx_events_occurred ON player_events(occurred_at)');
    },
  },
  {
    version: 6,
    name: 'players_playtime_credit',
    up: (db) => addColumnIfMissing(db, 'players', 'playtime_counted_login', 'TEXT'),
  },
];
