/**
 * Shared validation constants.
 *
 * Allowed condition operators and action types, shared by the validator
 * and the YAML loader.
 *
 * @module
 */

import type { ConditionOperator } from '../types/condition.js';
import type { RuleActionType } from '../types/action.js';

export const CONDITION_OPERATORS = [
  'eq', 'neq', 'gt', 'gte', 'lt', 'lte',
  'in', 'not_in', 'contains',
  'matches', 'exists', 'not_exists',
] as const satisfies readonly ConditionOperator[];

export const UNARY_OPERATORS = ['exists', 'not_exists'] as const satisfies readonly ConditionOperator[];

export const ACTION_TYPES = [
  'assert', 'retract', 'conclude',
  'recommend', 'set', 'increment',
] as const satisfies readonly RuleActionType[];

/** Action types that may omit `value`. */
export const VALUELESS_ACTION_TYPES = ['retract', 'increment'] as const satisfies readonly RuleActionType[];
