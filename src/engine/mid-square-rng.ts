import { assertSeedInDomain, type DomainPolicy } from './domain';
import { nextSeed } from './mid-square';
import { SEED_MODULUS } from './types';

/**
 * Maps a seed in [0, 10^10) onto [0, 1).
 */
export function toUnitInterval(seed: number): number {
  return seed / Number(SEED_MODULUS);
}

/**
 * Creates a deterministic RNG driven by Hammer's mid-square step.
 * Each call advances the seed once and returns it scaled to [0, 1).
 * Same seed produces identical sequence.
 */
export function createMidSquareRNG(
  seed: number,
  policy: DomainPolicy = 'permissive'
): () => number {
  if (policy === 'strict') assertSeedInDomain(seed);
  let state = seed;
  return function (): number {
    state = nextSeed(state);
    return toUnitInterval(state);
  };
}
