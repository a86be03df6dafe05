/**
 * Condition validation.
 *
 * @module
 */

import { CONDITION_OPERATORS, UNARY_OPERATORS } from '../constants.js';
import type { IssueCollector } from '../types.js';
import { isObject, hasProperty, isOneOf } from '../types.js';
import { isValidVariableName, normalizeOperand, referencedVariable } from '../../utils/variables.js';

export function validateConditions(
  conditions: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!Array.isArray(conditions)) {
    collector.addError(path, 'Conditions must be an array');
    return;
  }

  if (conditions.length === 0) {
    collector.addError(path, 'Rule must have at least one condition');
  }

  for (let i = 0; i < conditions.length; i++) {
    validateCondition(conditions[i], `${path}[${i}]`, collector);
  }
}

export function validateCondition(
  condition: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!isObject(condition)) {
    collector.addError(path, 'Condition must be an object');
    return;
  }

  if (!hasProperty(condition, 'predicate')) {
    collector.addError(`${path}.predicate`, 'Condition must have a "predicate" field');
  } else if (typeof condition['predicate'] !== 'string') {
    collector.addError(`${path}.predicate`, 'Condition predicate must be a string');
  } else if (condition['predicate'].trim() === '') {
    collector.addError(`${path}.predicate`, 'Condition predicate cannot be empty');
  }

  const operator = condition['operator'];
  if (!hasProperty(condition, 'operator')) {
    collector.addError(`${path}.operator`, 'Condition must have an "operator" field');
  } else if (typeof operator !== 'string') {
    collector.addError(`${path}.operator`, 'Condition operator must be a string');
  } else if (!isOneOf(CONDITION_OPERATORS, operator)) {
    collector.addError(
      `${path}.operator`,
      `Invalid operator: ${operator}. Valid operators: ${CONDITION_OPERATORS.join(', ')}`,
    );
  }

  if (isOneOf(CONDITION_OPERATORS, operator) && !isOneOf(UNARY_OPERATORS, operator)) {
    if (!hasProperty(condition, 'value')) {
      collector.addError(`${path}.value`, 'Condition must have a "value" field');
    } else {
      validateConditionValue(condition['value'], operator, `${path}.value`, collector);
    }
  }

  if (hasProperty(condition, 'weight')) {
    const weight = condition['weight'];
    if (typeof weight !== 'number' || !Number.isFinite(weight) || weight <= 0) {
      collector.addError(`${path}.weight`, 'Condition weight must be a positive number');
    }
  }

  if (hasProperty(condition, 'explanation') && typeof condition['explanation'] !== 'string') {
    collector.addError(`${path}.explanation`, 'Condition explanation must be a string');
  }

  // Vazba platí až po vyhodnocení podmínky
  if (hasProperty(condition, 'bind')) {
    const bind = condition['bind'];
    if (typeof bind !== 'string' || !isValidVariableName(bind)) {
      collector.addError(`${path}.bind`, 'Condition bind must be a valid variable name');
    } else {
      collector.boundVariables.add(bind);
    }
  }
}

function validateConditionValue(
  value: unknown,
  operator: string,
  path: string,
  collector: IssueCollector,
): void {
  if (normalizeOperand(value) === undefined) {
    collector.addError(path, 'Condition value must be JSON-compatible');
    return;
  }

  const name = referencedVariable(value);
  if (name !== undefined) {
    checkVariableReference(name, path, collector);
    return;
  }

  if (operator === 'matches') {
    if (typeof value !== 'string') {
      collector.addError(path, 'Operator "matches" requires a string pattern');
      return;
    }
    try {
      new RegExp(value);
    } catch {
      collector.addError(path, `Invalid regular expression: ${value}`);
    }
  }
}

/**
 * Reports a reference to a variable no earlier condition binds.
 */
export function checkVariableReference(
  name: string,
  path: string,
  collector: IssueCollector,
): void {
  collector.usedVariables.add(name);
  if (!isValidVariableName(name)) {
    collector.addError(path, `Invalid variable name: "${name}"`);
  } else if (!collector.boundVariables.has(name)) {
    collector.addWarning(path, `Variable "$${name}" is referenced before any condition binds it`);
  }
}
