import { nextSeed } from './mid-square';
import { SEED_MODULUS } from './types';

export type DomainPolicy = 'permissive' | 'strict';

export class SeedRangeError extends RangeError {
  readonly seed: number | bigint;

  constructor(seed: number | bigint) {
    super(`Seed ${seed} is outside [0, ${SEED_MODULUS})`);
    this.name = 'SeedRangeError';
    this.seed = seed;
  }
}

/**
 * True when the seed is an integer in [0, 10^10).
 */
export function isSeedInDomain(seed: number | bigint): boolean {
  if (typeof seed === 'number') {
    if (!Number.isInteger(seed)) return false;
    return seed >= 0 && seed < Number(SEED_MODULUS);
  }
  return seed >= 0n && seed < SEED_MODULUS;
}

export function assertSeedInDomain(seed: number | bigint): void {
  if (!isSeedInDomain(seed)) throw new SeedRangeError(seed);
}

/**
 * nextSeed behind a domain check. 'permissive' lets out-of-range seeds through
 * the arithmetic as-is; 'strict' throws SeedRangeError for them.
 */
export function nextSeedWithPolicy(seed: number, policy: DomainPolicy): number;
export function nextSeedWithPolicy(seed: bigint, policy: DomainPolicy): bigint;
export function nextSeedWithPolicy(
  seed: number | bigint,
  policy: DomainPolicy
): number | bigint {
  if (policy === 'strict') assertSeedInDomain(seed);
  return typeof seed === 'bigint' ? nextSeed(seed) : nextSeed(seed);
}
