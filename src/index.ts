export { computeStep, nextSeed } from './engine/mid-square';
export {
  assertSeedInDomain,
  isSeedInDomain,
  nextSeedWithPolicy,
  SeedRangeError,
} from './engine/domain';
export type { DomainPolicy } from './engine/domain';
export { createMidSquareRNG, toUnitInterval } from './engine/mid-square-rng';
export { HALF_MODULUS, MAX_SEED, SEED_DIGITS, SEED_MODULUS } from './engine/types';
export type { SeedStep } from './engine/types';
export { createDefaultConfig, DEFAULT_CONFIG } from './config';
export type { GeneratorConfig, LoggingMode } from './config';
export { generateSequence } from './sequence/runner';
export type { SequenceResult } from './sequence/runner';
