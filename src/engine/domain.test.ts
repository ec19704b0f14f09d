import {
  assertSeedInDomain,
  isSeedInDomain,
  nextSeedWithPolicy,
  SeedRangeError,
} from './domain';

describe('isSeedInDomain', () => {
  it('accepts integers in [0, 10^10)', () => {
    expect(isSeedInDomain(0)).toBe(true);
    expect(isSeedInDomain(9_999_999_999)).toBe(true);
    expect(isSeedInDomain(9_999_999_999n)).toBe(true);
  });

  it('rejects negative, oversized and fractional seeds', () => {
    expect(isSeedInDomain(-1)).toBe(false);
    expect(isSeedInDomain(10_000_000_000)).toBe(false);
    expect(isSeedInDomain(10_000_000_000n)).toBe(false);
    expect(isSeedInDomain(-1n)).toBe(false);
    expect(isSeedInDomain(0.5)).toBe(false);
    expect(isSeedInDomain(Number.NaN)).toBe(false);
  });
});

describe('assertSeedInDomain', () => {
  it('throws SeedRangeError carrying the seed', () => {
    expect(() => assertSeedInDomain(-5)).toThrow(SeedRangeError);
    try {
      assertSeedInDomain(10_000_000_000n);
      throw new Error('expected SeedRangeError');
    } catch (err) {
      expect(err).toBeInstanceOf(RangeError);
      expect(err).toBeInstanceOf(SeedRangeError);
      if (err instanceof SeedRangeError) {
        expect(err.seed).toBe(10_000_000_000n);
        expect(err.name).toBe('SeedRangeError');
        expect(err.message).toBe('Seed 10000000000 is outside [0, 10000000000)');
      }
    }
  });

  it('does nothing for seeds in the domain', () => {
    expect(() => assertSeedInDomain(1_234_567_891)).not.toThrow();
  });
});

describe('nextSeedWithPolicy', () => {
  it('permissive matches nextSeed for out-of-range seeds', () => {
    expect(nextSeedWithPolicy(-1_234_567_891, 'permissive')).toBe(1_578_774_881);
    expect(nextSeedWithPolicy(12_345_678_901n, 'permissive')).toBe(7_875_265_965n);
  });

  it('strict rejects out-of-range seeds', () => {
    expect(() => nextSeedWithPolicy(-1, 'strict')).toThrow(SeedRangeError);
    expect(() => nextSeedWithPolicy(10_000_000_000n, 'strict')).toThrow(SeedRangeError);
  });

  it('strict steps seeds in the domain', () => {
    expect(nextSeedWithPolicy(1_234_567_891, 'strict')).toBe(1_578_774_881);
    expect(nextSeedWithPolicy(1_111_111_111n, 'strict')).toBe(5_679_009_876n);
  });
});
