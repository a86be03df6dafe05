import type { ConflictStrategy } from './activation.js';
import type { EngineState } from './result.js';
import type { Logger, LogLevel } from '../utils/logger.js';

export * from './fact.js';
export * from './condition.js';
export * from './action.js';
export * from './rule.js';
export * from './activation.js';
export * from './result.js';
export * from './knowledge.js';

/** Konfigurace inferenčního enginu */
export interface InferenceEngineConfig {
  /** Jméno instance pro logy (výchozí: 'inference-engine') */
  name?: string;

  /** Strategie řešení konfliktů (výchozí: 'specificity') */
  strategy?: ConflictStrategy;

  /** Maximální počet cyklů (výchozí: 50) */
  maxCycles?: number;

  /** Prefix predikátu pro akce recommend (výchozí: 'recommendation:') */
  recommendationPrefix?: string;

  /** Minimální úroveň logování (výchozí: 'warn') */
  logLevel?: LogLevel;

  /** Vlastní logger (výchozí: console) */
  logger?: Logger;
}

/** Statistiky enginu napříč dotazy */
export interface EngineStats {
  name: string;
  state: EngineState;
  strategy: ConflictStrategy;
  maxCycles: number;
  queriesRun: number;
  totalCycles: number;
  totalRulesFired: number;
  lastElapsedMillis: number;
}
