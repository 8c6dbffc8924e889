/**
 * Game server journal parser.
 *
 * Extracts:
 * - Player join/leave events (for the player sync)
 * - The latest TPS and view radius (for performance samples)
 *
 * Line formats (after journalctl's timestamp prefix):
 *   ... Adding player 'Alice' to world 'Overworld' at location (1.0, 64.0, 2.5) (0f3c-...)
 *   ... Removing player 'Alice (Guest)' from world 'Overworld' (0f3c-...)
 *   ... Setting TPS of world Overworld to 20
 *   ... Initial view radius is 12
 *   ... View radius of world Overworld changed from 12 to 8
 *
 * Every function here is pure: output depends only on the lines passed in.
 */

import type { LatestMetrics, PlayerEvent, PlayerEventKind } from './types';

// ── Event patterns ───────────────────────────────────────────────────────────

export interface EventPattern {
  kind: PlayerEventKind;
  match(line: string): PlayerEvent | null;
}

const TIMESTAMP = String.raw`(\d{4}-\d{2}-\d{2}T\S+)`;
const PLAYER_ID = String.raw`\(([a-f0-9-]+)\)`;

const JOIN_LINE = new RegExp(
  `${TIMESTAMP}.*Adding player '([^']+)' to world '([^']+)' at location .+${PLAYER_ID}`
);

// Display names may carry a parenthesised suffix inside the quotes; it is dropped.
const LEAVE_LINE = new RegExp(
  `${TIMESTAMP}.*Removing player '([^']+?)(?:\\s*\\([^)]+\\))?'.*${PLAYER_ID}\\s*$`
);

export const joinPattern: EventPattern = {
  kind: 'join',
  match(line) {
    const m = JOIN_LINE.exec(line);
    if (!m) return null;
    return { timestamp: m[1], name: m[2], world: m[3], playerId: m[4], kind: 'join' };
  },
};

export const leavePattern: EventPattern = {
  kind: 'leave',
  match(line) {
    const m = LEAVE_LINE.exec(line);
    if (!m) return null;
    return { timestamp: m[1], name: m[2], world: null, playerId: m[3], kind: 'leave' };
  },
};

/** Tried in order; the first pattern that matches a line wins. */
export const DEFAULT_EVENT_PATTERNS: readonly EventPattern[] = [joinPattern, leavePattern];

/**
 * Extract player events in source-line order. Lines matching no pattern are
 * skipped; a line never produces more than one event.
 */
export function parsePlayerEvents(
  lines: readonly string[],
  patterns: readonly EventPattern[] = DEFAULT_EVENT_PATTERNS
): PlayerEvent[] {
  const events: PlayerEvent[] = [];

  for (const line of lines) {
    for (const pattern of patterns) {
      const event = pattern.match(line);
      if (event) {
        events.push(event);
        break;
      }
    }
  }

  return events;
}

// ── Metric scan ──────────────────────────────────────────────────────────────

const TPS_LINE = /(?:Setting )?TPS of world \S+ (?:set )?to (\d+)/;
const VIEW_RADIUS_LINE = /(?:Initial view radius is|[Vv]iew radius.*?to) (\d+)/;

/**
 * Scan newest-to-oldest for the most recent TPS and view radius. The two
 * values are found independently and may come from different lines.
 */
export function scanLatestMetrics(lines: readonly string[]): LatestMetrics {
  const result: LatestMetrics = { tps: null, viewRadius: null };

  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];

    if (result.tps === null) {
      const m = TPS_LINE.exec(line);
      if (m) result.tps = parseInt(m[1], 10);
    }

    if (result.viewRadius === null) {
      const m = VIEW_RADIUS_LINE.exec(line);
      if (m) result.viewRadius = parseInt(m[1], 10);
    }

    if (result.tps !== null && result.viewRadius !== null) break;
  }

  return result;
}
