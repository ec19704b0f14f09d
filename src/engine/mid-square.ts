import { HALF_MODULUS, SEED_MODULUS, type SeedStep } from './types';

/**
 * Hammer's mid-square step with every partial term exposed.
 *
 * Splits the seed into a = seed / 10^5 and b = seed mod 10^5, then rebuilds
 * digits 5..14 of seed^2 from a^2, 2ab and b^2 without forming the full square.
 * Division truncates toward zero and `%` keeps the sign of the dividend, so
 * negative or oversized seeds pass through the same arithmetic unchecked.
 */
export function computeStep(seed: bigint): SeedStep {
  const a = seed / HALF_MODULUS;
  const b = seed % HALF_MODULUS;
  const t1 = (a * a * HALF_MODULUS) % SEED_MODULUS;
  const t2 = (2n * a * b) % SEED_MODULUS;
  const t3 = (b * b) / HALF_MODULUS;
  return { seed, a, b, t1, t2, t3, next: (t1 + t2 + t3) % SEED_MODULUS };
}

/**
 * Returns the next 10-digit seed. Pure; the same input always yields the same output.
 * A number argument must be an integer (BigInt conversion throws a RangeError otherwise);
 * the result is always within Number's safe integer range.
 */
export function nextSeed(seed: number): number;
export function nextSeed(seed: bigint): bigint;
export function nextSeed(seed: number | bigint): number | bigint {
  if (typeof seed === 'bigint') return computeStep(seed).next;
  return Number(computeStep(BigInt(seed)).next);
}
