export { FactStore, type FactStoreConfig, type FactAssertedListener } from './fact-store.js';
export { Agenda } from './agenda.js';
export {
  CONFLICT_STRATEGIES,
  DEFAULT_STRATEGY,
  getComparator,
  isConflictStrategy,
  describeDecision
} from './strategies.js';
export { createRule } from './rule-factory.js';
export { KnowledgeBase } from './knowledge-base.js';
export {
  resolveEngineConfig,
  DEFAULT_MAX_CYCLES,
  DEFAULT_ENGINE_NAME,
  type ResolvedEngineConfig
} from './engine-config.js';
export {
  InferenceEngine,
  TERMINATION_AGENDA_EMPTY,
  TERMINATION_CYCLE_LIMIT
} from './inference-engine.js';
export { DuplicateRuleError, EngineBusyError, InvalidConfigError } from './errors.js';
