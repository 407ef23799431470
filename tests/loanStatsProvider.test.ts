import {
  createLoanStatsProvider,
  hashTitle,
  MAX_LOAN_COUNT,
  MAX_LOAN_RANK,
  RandomLoanStatsProvider,
  SeededLoanStatsProvider,
} from '../server/services/loanStatsProvider';

describe('Loan statistics providers', () => {
  it('hashes titles with 32-bit FNV-1a', () => {
    expect(hashTitle('')).toBe(0x811c9dc5);
    expect(hashTitle('a')).toBe(0xe40c292c);
  });

  it('gives the same title the same numbers every time', () => {
    const first = new SeededLoanStatsProvider().statsFor('The Quiet River');
    const second = new SeededLoanStatsProvider().statsFor('The Quiet River');
    expect(second).toEqual(first);
  });

  it('keeps seeded numbers inside the placeholder ranges', () => {
    const provider = new SeededLoanStatsProvider();
    for (let i = 0; i < 200; i++) {
      const { rank, count } = provider.statsFor(`Title ${i}`);
      expect(Number.isInteger(rank)).toBe(true);
      expect(Number.isInteger(count)).toBe(true);
      expect(rank).toBeGreaterThanOrEqual(1);
      expect(rank).toBeLessThanOrEqual(MAX_LOAN_RANK);
      expect(count).toBeGreaterThanOrEqual(1);
      expect(count).toBeLessThanOrEqual(MAX_LOAN_COUNT);
    }
  });

  it('maps random draws onto 1..50 and 1..300', () => {
    const low = new RandomLoanStatsProvider(() => 0).statsFor();
    const high = new RandomLoanStatsProvider(() => 0.999999).statsFor();
    expect(low).toEqual({ rank: 1, count: 1 });
    expect(high).toEqual({ rank: 50, count: 300 });
  });

  it('selects the provider from the configured mode', () => {
    expect(createLoanStatsProvider('seeded')).toBeInstanceOf(SeededLoanStatsProvider);
    expect(createLoanStatsProvider('random')).toBeInstanceOf(RandomLoanStatsProvider);
  });
});
