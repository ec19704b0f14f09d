/** Number of decimal digits in a seed. */
export const SEED_DIGITS = 10;

/** 10^5: splits a seed into its high and low five-digit halves. */
export const HALF_MODULUS = 100_000n;

/** 10^10: every seed produced by a step lies in [0, SEED_MODULUS). */
export const SEED_MODULUS = 10_000_000_000n;

/** Largest seed in the documented domain (9999999999). */
export const MAX_SEED = Number(SEED_MODULUS) - 1;

/**
 * One mid-square step broken into its partial terms.
 * `a`/`b` are the high and low halves of `seed`; `next` is (t1 + t2 + t3) mod 10^10.
 */
export interface SeedStep {
  seed: bigint;
  a: bigint;
  b: bigint;
  t1: bigint;
  t2: bigint;
  t3: bigint;
  next: bigint;
}
