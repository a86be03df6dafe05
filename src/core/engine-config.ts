import type { ConflictStrategy } from '../types/activation.js';
import type { InferenceEngineConfig } from '../types/index.js';
import { LOG_LEVELS, type Logger, type LogLevel } from '../utils/logger.js';
import { DEFAULT_RECOMMENDATION_PREFIX } from '../evaluation/action-executor.js';
import { CONFLICT_STRATEGIES, DEFAULT_STRATEGY, isConflictStrategy } from './strategies.js';
import { InvalidConfigError } from './errors.js';

export const DEFAULT_MAX_CYCLES = 50;
export const DEFAULT_ENGINE_NAME = 'inference-engine';

/** Plně vyřešená konfigurace enginu */
export interface ResolvedEngineConfig {
  name: string;
  strategy: ConflictStrategy;
  maxCycles: number;
  recommendationPrefix: string;
  logLevel: LogLevel;
  logger: Logger;
}

/**
 * Doplní výchozí hodnoty a zkontroluje konfiguraci.
 *
 * Hodnoty mohou přijít z neotypovaných zdrojů (CLI, HTTP), proto se
 * kontrolují i za běhu.
 *
 * @throws {InvalidConfigError} Pro neplatnou hodnotu
 */
export function resolveEngineConfig(config: InferenceEngineConfig = {}): ResolvedEngineConfig {
  const name = config.name ?? DEFAULT_ENGINE_NAME;
  if (name.trim() === '') {
    throw new InvalidConfigError('name', 'must be a non-empty string');
  }

  const strategy: unknown = config.strategy ?? DEFAULT_STRATEGY;
  if (!isConflictStrategy(strategy)) {
    throw new InvalidConfigError(
      'strategy',
      `unknown strategy "${String(strategy)}", expected one of: ${CONFLICT_STRATEGIES.join(', ')}`
    );
  }

  const maxCycles = config.maxCycles ?? DEFAULT_MAX_CYCLES;
  if (!Number.isInteger(maxCycles) || maxCycles < 1) {
    throw new InvalidConfigError('maxCycles', `must be an integer >= 1, got ${maxCycles}`);
  }

  const logLevel: unknown = config.logLevel ?? 'warn';
  if (!LOG_LEVELS.some(level => level === logLevel)) {
    throw new InvalidConfigError(
      'logLevel',
      `unknown level "${String(logLevel)}", expected one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  return {
    name,
    strategy,
    maxCycles,
    recommendationPrefix: config.recommendationPrefix ?? DEFAULT_RECOMMENDATION_PREFIX,
    logLevel: config.logLevel ?? 'warn',
    logger: config.logger ?? console
  };
}
