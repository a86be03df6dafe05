import type { Rule, RuleInput } from '../types/rule.js';
import type { RuleCondition, RuleConditionInput } from '../types/condition.js';
import type { RuleAction, RuleActionInput } from '../types/action.js';
import { RuleInputValidator } from '../validation/rule-validator.js';
import { RuleValidationError } from '../validation/rule-validation-error.js';
import { normalizeOperand } from '../utils/variables.js';
import { deepFreeze } from '../utils/values.js';

const validator = new RuleInputValidator();

/**
 * Vytvoří neměnné pravidlo ze vstupu.
 *
 * Vstup se nejdřív validuje; operandy `$x` se převedou na `{ var }`
 * reference a odvozená pole (specificity, complexity) se dopočítají.
 *
 * @throws {RuleValidationError} Pokud vstup neprojde validací
 */
export function createRule(input: RuleInput): Rule {
  const result = validator.validate(input);
  if (!result.valid) {
    throw RuleValidationError.fromResult(`Rule "${input.id}"`, result);
  }

  const conditions = input.conditions.map(normalizeCondition);
  const actions = input.actions.map(normalizeAction);

  const rule: Rule = {
    id: input.id,
    name: input.name ?? input.id,
    description: input.description ?? '',
    domain: input.domain ?? 'general',
    source: input.source ?? '',
    tags: [...(input.tags ?? [])],
    priority: input.priority ?? 0,
    specificity: input.specificity ?? conditions.length,
    complexity: input.complexity ?? conditions.length + actions.length,
    active: input.active ?? true,
    conditions,
    actions
  };

  return deepFreeze(rule);
}

function normalizeCondition(input: RuleConditionInput): RuleCondition {
  return {
    predicate: input.predicate,
    operator: input.operator,
    // exists/not_exists hodnotu nepotřebují
    value: normalizeOperand(input.value) ?? null,
    ...(input.bind !== undefined && { bind: input.bind }),
    weight: input.weight ?? 1,
    explanation: input.explanation ?? ''
  };
}

function normalizeAction(input: RuleActionInput): RuleAction {
  const value = input.value === undefined ? undefined : normalizeOperand(input.value);
  return {
    type: input.type,
    predicate: input.predicate,
    ...(value !== undefined && { value }),
    confidence: input.confidence ?? 1,
    explanation: input.explanation ?? ''
  };
}
