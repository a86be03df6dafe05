/**
 * YAML schema validation and transformation into `RuleInput`.
 *
 * Checks the structure of each rule with path-aware error messages.
 * Semantic checks (variables bound before use, regex syntax, confidence
 * range) are left to the rule validator that runs when the rule is created.
 *
 * Variable references use the authoring syntax: `"$name"` refers to a
 * variable bound by an earlier condition, `"$$text"` is the literal
 * `"$text"`. Both are kept as written; the rule factory normalizes them.
 *
 * @module
 */

import type { RuleInput } from '../../types/rule.js';
import type { RuleConditionInput } from '../../types/condition.js';
import type { RuleActionInput } from '../../types/action.js';
import { DslError } from '../helpers/errors.js';
import { isObject, isOneOf } from '../../validation/types.js';
import { ACTION_TYPES, CONDITION_OPERATORS } from '../../validation/constants.js';

const CONDITION_OPERATORS_MSG = CONDITION_OPERATORS.join(', ');
const ACTION_TYPES_MSG = ACTION_TYPES.join(', ');

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class YamlValidationError extends DslError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(`${path}: ${message}`);
    this.name = 'YamlValidationError';
    this.path = path;
  }
}

// ---------------------------------------------------------------------------
// Primitive validators
// ---------------------------------------------------------------------------

function has(obj: Record<string, unknown>, key: string): boolean {
  return key in obj && obj[key] !== undefined && obj[key] !== null;
}

function requireField(obj: Record<string, unknown>, field: string, path: string): unknown {
  if (!has(obj, field)) {
    throw new YamlValidationError(`missing required field "${field}"`, path);
  }
  return obj[field];
}

function requireString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new YamlValidationError(
      `must be a non-empty string, got ${value === '' ? 'empty string' : typeof value}`,
      path,
    );
  }
  return value;
}

function requireText(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new YamlValidationError(`must be a string, got ${typeof value}`, path);
  }
  return value;
}

function requireNumber(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new YamlValidationError(`must be a finite number, got ${typeof value}`, path);
  }
  return value;
}

function requireBoolean(value: unknown, path: string): boolean {
  if (typeof value !== 'boolean') {
    throw new YamlValidationError(`must be a boolean, got ${typeof value}`, path);
  }
  return value;
}

function requireArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new YamlValidationError(`must be an array, got ${typeof value}`, path);
  }
  return value;
}

function requireObject(value: unknown, path: string): Record<string, unknown> {
  if (!isObject(value)) {
    throw new YamlValidationError(
      `must be an object, got ${Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value}`,
      path,
    );
  }
  return value;
}

// ---------------------------------------------------------------------------
// Conditions and actions
// ---------------------------------------------------------------------------

function validateCondition(obj: unknown, path: string): RuleConditionInput {
  const o = requireObject(obj, path);
  const operator = requireString(requireField(o, 'operator', path), `${path}.operator`);

  if (!isOneOf(CONDITION_OPERATORS, operator)) {
    throw new YamlValidationError(
      `invalid operator "${operator}". Expected: ${CONDITION_OPERATORS_MSG}`,
      `${path}.operator`,
    );
  }

  const condition: RuleConditionInput = {
    predicate: requireString(requireField(o, 'predicate', path), `${path}.predicate`),
    operator,
  };

  // `value: null` je platný literál - proto `in`, ne `has`
  if ('value' in o) {
    condition.value = o['value'];
  }
  if (has(o, 'bind')) {
    condition.bind = requireString(o['bind'], `${path}.bind`);
  }
  if (has(o, 'weight')) {
    condition.weight = requireNumber(o['weight'], `${path}.weight`);
  }
  if (has(o, 'explanation')) {
    condition.explanation = requireText(o['explanation'], `${path}.explanation`);
  }

  return condition;
}

function validateAction(obj: unknown, path: string): RuleActionInput {
  const o = requireObject(obj, path);
  const type = requireString(requireField(o, 'type', path), `${path}.type`);

  if (!isOneOf(ACTION_TYPES, type)) {
    throw new YamlValidationError(
      `invalid action type "${type}". Expected: ${ACTION_TYPES_MSG}`,
      `${path}.type`,
    );
  }

  const action: RuleActionInput = {
    type,
    predicate: requireString(requireField(o, 'predicate', path), `${path}.predicate`),
  };

  if ('value' in o) {
    action.value = o['value'];
  }
  if (has(o, 'confidence')) {
    action.confidence = requireNumber(o['confidence'], `${path}.confidence`);
  }
  if (has(o, 'explanation')) {
    action.explanation = requireText(o['explanation'], `${path}.explanation`);
  }

  return action;
}

// ---------------------------------------------------------------------------
// Rule
// ---------------------------------------------------------------------------

/**
 * Validates a raw YAML object and transforms it into a `RuleInput`.
 *
 * @param obj  - Raw parsed YAML object.
 * @param path - Path prefix for error messages.
 * @throws {YamlValidationError} On structural errors.
 */
export function validateRule(obj: unknown, path: string = 'rule'): RuleInput {
  const o = requireObject(obj, path);

  const id = requireString(requireField(o, 'id', path), `${path}.id`);

  const conditionsArr = requireArray(requireField(o, 'conditions', path), `${path}.conditions`);
  if (conditionsArr.length === 0) {
    throw new YamlValidationError('must have at least one condition', `${path}.conditions`);
  }

  const actionsArr = requireArray(requireField(o, 'actions', path), `${path}.actions`);
  if (actionsArr.length === 0) {
    throw new YamlValidationError('must have at least one action', `${path}.actions`);
  }

  const tagsArr = requireArray(o['tags'] ?? [], `${path}.tags`);

  const rule: RuleInput = {
    id,
    tags: tagsArr.map((t, i) => requireString(t, `${path}.tags[${i}]`)),
    conditions: conditionsArr.map((c, i) => validateCondition(c, `${path}.conditions[${i}]`)),
    actions: actionsArr.map((a, i) => validateAction(a, `${path}.actions[${i}]`)),
  };

  for (const field of ['name', 'description', 'domain', 'source'] as const) {
    if (has(o, field)) {
      rule[field] = requireText(o[field], `${path}.${field}`);
    }
  }

  for (const field of ['priority', 'specificity', 'complexity'] as const) {
    if (has(o, field)) {
      rule[field] = requireNumber(o[field], `${path}.${field}`);
    }
  }

  if (has(o, 'active')) {
    rule.active = requireBoolean(o['active'], `${path}.active`);
  }

  return rule;
}
