/**
 * Placeholder loan statistics. No real circulation data is ingested; these
 * providers only give every title a rank and a count to display.
 */

export interface LoanStats {
  /** 1..50 */
  rank: number;
  /** 1..300 */
  count: number;
}

export type LoanStatsMode = 'seeded' | 'random';

export interface LoanStatsProvider {
  statsFor(title: string): LoanStats;
}

export const MAX_LOAN_RANK = 50;
export const MAX_LOAN_COUNT = 300;

// 32-bit FNV-1a over UTF-16 code units
export const hashTitle = (title: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < title.length; i++) {
    hash ^= title.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
};

const mulberry32 = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

const drawStats = (next: () => number): LoanStats => ({
  rank: 1 + Math.floor(next() * MAX_LOAN_RANK),
  count: 1 + Math.floor(next() * MAX_LOAN_COUNT),
});

/**
 * Same title, same numbers, across sessions and restarts.
 */
export class SeededLoanStatsProvider implements LoanStatsProvider {
  statsFor(title: string): LoanStats {
    return drawStats(mulberry32(hashTitle(title)));
  }
}

export class RandomLoanStatsProvider implements LoanStatsProvider {
  constructor(private readonly random: () => number = Math.random) {}

  statsFor(): LoanStats {
    return drawStats(this.random);
  }
}

export const createLoanStatsProvider = (mode: LoanStatsMode): LoanStatsProvider =>
  mode === 'random' ? new RandomLoanStatsProvider() : new SeededLoanStatsProvider();
