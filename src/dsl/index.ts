/**
 * DSL (Domain Specific Language) for **forward-rules**.
 *
 * Provides two complementary ways to define rules:
 *
 * 1. **Fluent Builder API**: TypeScript-native, type-safe, IDE-friendly.
 * 2. **YAML Loader**: knowledge bases kept in external files.
 *
 * @example
 * ```typescript
 * import { Rule, fact, assertFact, recommend, v } from 'forward-rules/dsl';
 *
 * const rule = Rule.create('R011')
 *   .name('Outdoor, full sun and wind')
 *   .domain('final_recommendation')
 *   .if(fact('location').eq('outdoor'))
 *   .and(fact('light').eq('full_sun').as('light'))
 *   .then(recommend('ideal_plant', 'Black shrub').confidence(0.97))
 *   .also(assertFact('light_seen', v('light')))
 *   .build();
 * ```
 *
 * @module dsl
 */

// Builder
export { Rule, RuleBuilder } from './builder/rule-builder.js';

// Conditions
export { fact, FactExpr } from './condition/fact-expr.js';

// Actions
export {
  assertFact,
  conclude,
  recommend,
  setVar,
  increment,
  retract,
  FactActionBuilder,
} from './action/fact-actions.js';

// YAML loader
export {
  loadRulesFromYAML,
  loadRulesFromFile,
  parseRuleDocument,
  YamlLoadError,
  validateRule,
  YamlValidationError,
  type RuleDocument,
} from './yaml/index.js';

// Helpers
export { v } from './helpers/index.js';

// Errors
export { DslError, DslValidationError } from './helpers/index.js';

// Types
export type { ValueOrVar, ConditionBuilder, ActionBuilder, BuiltRule } from './types.js';
