export { Bindings, isVariableRef, type ResolveResult } from './bindings.js';
export {
  ConditionEvaluator,
  type ConditionOutcome,
  type RuleMatch,
  type EvaluationContext
} from './condition-evaluator.js';
export {
  ActionExecutor,
  DEFAULT_RECOMMENDATION_PREFIX,
  type ActionExecutorOptions
} from './action-executor.js';
