export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface FrecencyInput {
  path: string;
  frequency: number;
  /** ISO-8601 timestamp of the last visit. */
  lastSeen: string;
}

export type Scored<T> = T & { score: number };

/**
 * Age of a visit in fractional days. Visits stamped in the future
 * (clock skew between machines sharing a home dir) count as age 0.
 */
export function ageInDays(lastSeen: Date, now: Date): number {
  const elapsed = now.getTime() - lastSeen.getTime();
  return elapsed > 0 ? elapsed / MS_PER_DAY : 0;
}

/**
 * score = frequency × 1 / (1 + age_in_days)
 *
 * Yesterday's single visit (0.5) still beats fifty visits from a year ago (≈0.137).
 */
export function frecencyScore(frequency: number, lastSeen: Date, now: Date): number {
  return frequency * (1 / (1 + ageInDays(lastSeen, now)));
}

function lastSeenMillis(value: string): number {
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? 0 : ms;
}

/** Descending score, then most recent visit, then path for a total order. */
export function compareFrecency<T extends FrecencyInput>(a: Scored<T>, b: Scored<T>): number {
  if (b.score !== a.score) return b.score - a.score;
  const seen = lastSeenMillis(b.lastSeen) - lastSeenMillis(a.lastSeen);
  if (seen !== 0) return seen;
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

export function rankByFrecency<T extends FrecencyInput>(items: readonly T[], now: Date, limit?: number): Array<Scored<T>> {
  const scored = items.map((item) => ({
    ...item,
    score: frecencyScore(item.frequency, new Date(lastSeenMillis(item.lastSeen)), now),
  }));
  scored.sort(compareFrecency);
  return limit !== undefined ? scored.slice(0, Math.max(0, limit)) : scored;
}
