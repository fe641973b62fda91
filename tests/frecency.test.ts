import { describe, it, expect } from '@jest/globals';
import { MS_PER_DAY, ageInDays, frecencyScore, rankByFrecency } from '../src/ranking/frecency.js';

const now = new Date('2024-06-01T00:00:00.000Z');
const daysAgo = (days: number) => new Date(now.getTime() - days * MS_PER_DAY).toISOString();

describe('frecency', () => {
  it('computes fractional age in days', () => {
    expect(ageInDays(new Date(now.getTime() - 12 * 60 * 60 * 1000), now)).toBe(0.5);
    expect(ageInDays(now, now)).toBe(0);
  });

  it('treats visits stamped in the future as age zero', () => {
    const future = new Date(now.getTime() + 2 * MS_PER_DAY);
    expect(ageInDays(future, now)).toBe(0);
    expect(frecencyScore(7, future, now)).toBe(7);
  });

  it('decays frequency by age', () => {
    expect(frecencyScore(10, now, now)).toBe(10);
    expect(frecencyScore(4, new Date(daysAgo(1)), now)).toBe(2);
    expect(frecencyScore(5, new Date(daysAgo(30)), now)).toBeCloseTo(5 / 31, 10);
  });

  it('ranks recent frequent dirs above old ones', () => {
    const ranked = rankByFrecency(
      [
        { path: '/old', frequency: 5, lastSeen: daysAgo(30) },
        { path: '/hot', frequency: 10, lastSeen: daysAgo(0) },
      ],
      now
    );
    expect(ranked.map((d) => d.path)).toEqual(['/hot', '/old']);
    expect(ranked[0]?.score).toBe(10);
  });

  it('lets a single fresh visit beat fifty stale ones', () => {
    const ranked = rankByFrecency(
      [
        { path: '/stale', frequency: 50, lastSeen: daysAgo(300) },
        { path: '/fresh', frequency: 1, lastSeen: daysAgo(0) },
      ],
      now
    );
    expect(ranked.map((d) => d.path)).toEqual(['/fresh', '/stale']);
    expect(ranked[1]?.score).toBeCloseTo(50 / 301, 10);
  });

  it('breaks score ties by most recent visit, then by path', () => {
    const ranked = rankByFrecency(
      [
        { path: '/b', frequency: 1, lastSeen: daysAgo(0) },
        { path: '/yesterday', frequency: 2, lastSeen: daysAgo(1) },
        { path: '/a', frequency: 1, lastSeen: daysAgo(0) },
      ],
      now
    );
    expect(ranked.map((d) => d.score)).toEqual([1, 1, 1]);
    expect(ranked.map((d) => d.path)).toEqual(['/a', '/b', '/yesterday']);
  });

  it('keeps the extra fields of each item and applies the limit', () => {
    const ranked = rankByFrecency(
      [
        { path: '/x', frequency: 3, lastSeen: daysAgo(0), id: 7 },
        { path: '/y', frequency: 1, lastSeen: daysAgo(0), id: 8 },
      ],
      now,
      1
    );
    expect(ranked).toEqual([{ path: '/x', frequency: 3, lastSeen: daysAgo(0), id: 7, score: 3 }]);
    expect(rankByFrecency([{ path: '/x', frequency: 3, lastSeen: daysAgo(0) }], now, 0)).toEqual([]);
  });

  it('scores unparseable timestamps as very old', () => {
    const ranked = rankByFrecency(
      [
        { path: '/broken', frequency: 100, lastSeen: 'not a date' },
        { path: '/ok', frequency: 1, lastSeen: daysAgo(10) },
      ],
      now
    );
    expect(ranked.map((d) => d.path)).toEqual(['/ok', '/broken']);
  });
});
