// ── Time helpers ──────────────────────────────────────────────────────────
// Relative windows ("3 days ago") are resolved here to absolute instants so
// neither journalctl nor SQLite ever interprets a relative expression.

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function isoInstant(ms: number): string {
  return new Date(ms).toISOString();
}

// journalctl short-iso stamps carry the offset without a colon: +0000
const COMPACT_OFFSET = /([+-]\d{2})(\d{2})$/;
// short-iso-precise adds microseconds; Date.parse only takes milliseconds
const SUB_MILLISECOND = /(\.\d{3})\d+/;

/**
 * Parse a timestamp as it appears at the start of a journal line.
 * Returns epoch milliseconds, or null when the text is not a usable date.
 */
export function parseLogTimestamp(ts: string): number | null {
  const normalized = ts.replace(SUB_MILLISECOND, '$1').replace(COMPACT_OFFSET, '$1:$2');
  const ms = Date.parse(normalized);
  return Number.isNaN(ms) ? null : ms;
}

/** A journal stamp as a UTC ISO instant; unparseable text is returned as is. */
export function utcInstant(ts: string): string {
  const ms = parseLogTimestamp(ts);
  return ms === null ? ts : isoInstant(ms);
}

/** Format an instant the way `journalctl --since` accepts it: "YYYY-MM-DD HH:MM:SS UTC". */
export function journalTime(ms: number): string {
  return `${new Date(ms).toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

/**
 * Turn a stored checkpoint into a --since argument. Checkpoints are kept
 * exactly as written in the source line; anything unparseable is passed
 * through untouched.
 */
export function sinceArgument(checkpoint: string): string {
  const ms = parseLogTimestamp(checkpoint);
  return ms === null ? checkpoint : journalTime(ms);
}
