import type { FactValue } from '../types/fact.js';
import type { VariableRef, RuleConditionInput } from '../types/condition.js';
import type { RuleActionInput } from '../types/action.js';
import type { RuleInput } from '../types/rule.js';

/**
 * A literal fact value or a reference to a variable bound by an earlier
 * condition.
 *
 * @see {@link v} — factory function for creating variable references
 */
export type ValueOrVar = FactValue | VariableRef;

/**
 * Builder interface for conditions.
 *
 * Implemented by {@link FactExpr} to provide a fluent operator API.
 */
export interface ConditionBuilder {
  /** Builds and returns the underlying condition input. */
  build(): RuleConditionInput;
}

/**
 * Builder interface for actions.
 *
 * Implemented by the builders returned from `assertFact`, `conclude`,
 * `recommend`, `setVar`, `increment` and `retract`.
 */
export interface ActionBuilder {
  /** Builds and returns the underlying action input. */
  build(): RuleActionInput;
}

/**
 * Internal mutable state accumulated by {@link RuleBuilder} during the
 * fluent building process.
 *
 * @internal
 */
export interface RuleBuildContext {
  id: string;
  name?: string;
  description?: string;
  domain?: string;
  source?: string;
  priority?: number;
  specificity?: number;
  complexity?: number;
  active?: boolean;
  tags: string[];
  conditions: RuleConditionInput[];
  actions: RuleActionInput[];
}

/**
 * The output of {@link RuleBuilder.build}, ready to be registered with a
 * knowledge base.
 */
export type BuiltRule = RuleInput;
