import type { GeneratorConfig } from '../config';
import { assertSeedInDomain } from '../engine/domain';
import { computeStep } from '../engine/mid-square';
import { toUnitInterval } from '../engine/mid-square-rng';
import type { SeedStep } from '../engine/types';

export interface SequenceResult {
  initialSeed: number;
  seeds: number[];
  variates: number[];
  timing: {
    totalMs: number;
    avgPerStepMs: number;
  };
  trace?: SeedStep[];
}

/**
 * Iterates the mid-square step `config.stepCount` times from `config.initialSeed`.
 * seeds[i] is the seed after i + 1 steps; variates[i] is seeds[i] scaled to [0, 1).
 * In debug logging mode every step's partial terms are kept in `trace`.
 */
export function generateSequence(config: GeneratorConfig): SequenceResult {
  if (!Number.isInteger(config.stepCount) || config.stepCount < 0) {
    throw new Error(`stepCount must be a non-negative integer, got ${config.stepCount}`);
  }
  if (config.domainPolicy === 'strict') assertSeedInDomain(config.initialSeed);

  const collectTrace = config.loggingMode === 'debug';
  const seeds: number[] = [];
  const variates: number[] = [];
  const trace: SeedStep[] = [];

  const t0 = performance.now();
  let seed = BigInt(config.initialSeed);
  for (let i = 0; i < config.stepCount; i++) {
    const step = computeStep(seed);
    if (collectTrace) trace.push(step);
    seed = step.next;
    const value = Number(seed);
    seeds.push(value);
    variates.push(toUnitInterval(value));
  }
  const totalMs = performance.now() - t0;

  return {
    initialSeed: config.initialSeed,
    seeds,
    variates,
    timing: {
      totalMs,
      avgPerStepMs: config.stepCount > 0 ? totalMs / config.stepCount : 0,
    },
    ...(collectTrace ? { trace } : {}),
  };
}
