import type { DomainPolicy } from '../engine/domain';

export type LoggingMode = 'normal' | 'debug';

export interface GeneratorConfig {
  initialSeed: number;
  stepCount: number;
  domainPolicy: DomainPolicy;
  loggingMode: LoggingMode;
}

export const DEFAULT_CONFIG: GeneratorConfig = {
  initialSeed: 1_111_111_111,
  stepCount: 240,
  domainPolicy: 'permissive',
  loggingMode: 'normal',
};

export function createDefaultConfig(overrides?: Partial<GeneratorConfig>): GeneratorConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}
