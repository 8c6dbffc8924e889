// ── Log-derived events ─────────────────────────────────────────────────────

export type PlayerEventKind = 'join' | 'leave';

/**
 * A join or leave extracted from one journal line. `timestamp` is kept exactly
 * as written in the source so it can be handed back to journalctl as the next
 * scan's starting point.
 */
export interface PlayerEvent {
  timestamp: string;
  playerId: string;
  name: string;
  kind: PlayerEventKind;
  /** Set for joins, null for leaves. */
  world: string | null;
}

export interface LatestMetrics {
  tps: number | null;
  viewRadius: number | null;
}

// ── Database rows ──────────────────────────────────────────────────────────

export interface DbPlayer {
  uuid: string;
  name: string;
  online: 0 | 1;
  last_login: string | null;
  last_logout: string | null;
  world: string | null;
  total_playtime_seconds: number;
  /** last_login of the most recent session already added to the total. */
  playtime_counted_login: string | null;
}

export interface DbPlayerEvent {
  id: number;
  timestamp: string;
  /** `timestamp` as a UTC ISO instant. */
  occurred_at: string;
  uuid: string;
  name: string;
  event_type: PlayerEventKind;
  world: string | null;
}

export interface DbPerformanceSample {
  id: number;
  timestamp: string;
  tps: number | null;
  cpu_percent: number | null;
  ram_mb: number | null;
  ram_percent: number | null;
  view_radius: number | null;
  players_online: number;
}

export type NewPerformanceSample = Omit<DbPerformanceSample, 'id'>;

// ── Task results ───────────────────────────────────────────────────────────

export interface SyncResult {
  /** Events extracted from the window. */
  events: number;
  /** Events that were new (not already in the event log). */
  applied: number;
  checkpoint: string | null;
}

export interface PruneResult {
  performanceDeleted: number;
  eventsDeleted: number;
}
