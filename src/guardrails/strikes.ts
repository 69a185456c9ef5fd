/**
 * Strike tracking for tool failures
 *
 * Counts consecutive failures per tool. A success clears the count; idle
 * entries expire after STRIKE_TTL_MS, and at most MAX_TRACKED_KEYS keys
 * are kept (oldest dropped first).
 */

/** Consecutive failures before a tool escalates instead of retrying */
export const STRIKE_LIMIT = 3;

const STRIKE_TTL_MS = 30 * 60 * 1000;
const MAX_TRACKED_KEYS = 200;

interface StrikeEntry {
  count: number;
  firstSeen: number;
  lastSeen: number;
}

const strikes = new Map<string, StrikeEntry>();

function isExpired(entry: StrikeEntry, now: number): boolean {
  return now - entry.lastSeen > STRIKE_TTL_MS;
}

function prune(now: number): void {
  for (const [key, entry] of strikes) {
    if (isExpired(entry, now)) strikes.delete(key);
  }

  if (strikes.size > MAX_TRACKED_KEYS) {
    const oldestFirst = [...strikes.entries()].sort((a, b) => a[1].firstSeen - b[1].firstSeen);
    for (const [key] of oldestFirst.slice(0, strikes.size - MAX_TRACKED_KEYS)) {
      strikes.delete(key);
    }
  }
}

/** Record a failure. Returns the strike count after incrementing. */
export function recordStrike(key: string, now: number = Date.now()): number {
  prune(now);
  const existing = strikes.get(key);
  const entry: StrikeEntry = existing
    ? { count: existing.count + 1, firstSeen: existing.firstSeen, lastSeen: now }
    : { count: 1, firstSeen: now, lastSeen: now };
  strikes.set(key, entry);
  return entry.count;
}

export function clearStrikes(key: string): void {
  strikes.delete(key);
}

export function getStrikeCount(key: string, now: number = Date.now()): number {
  const entry = strikes.get(key);
  if (!entry) return 0;
  if (isExpired(entry, now)) {
    strikes.delete(key);
    return 0;
  }
  return entry.count;
}

/** Forget all strikes (for testing) */
export function resetStrikes(): void {
  strikes.clear();
}
