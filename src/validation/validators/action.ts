/**
 * Action validation.
 *
 * @module
 */

import { ACTION_TYPES, VALUELESS_ACTION_TYPES } from '../constants.js';
import type { IssueCollector } from '../types.js';
import { isObject, hasProperty, isOneOf } from '../types.js';
import { normalizeOperand, referencedVariable } from '../../utils/variables.js';
import { checkVariableReference } from './condition.js';

export function validateActions(
  actions: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!Array.isArray(actions)) {
    collector.addError(path, 'Actions must be an array');
    return;
  }

  if (actions.length === 0) {
    collector.addError(path, 'Rule must have at least one action');
  }

  for (let i = 0; i < actions.length; i++) {
    validateAction(actions[i], `${path}[${i}]`, collector);
  }
}

export function validateAction(
  action: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!isObject(action)) {
    collector.addError(path, 'Action must be an object');
    return;
  }

  if (!hasProperty(action, 'type')) {
    collector.addError(`${path}.type`, 'Action must have a "type" field');
    return;
  }

  const type = action['type'];
  if (typeof type !== 'string') {
    collector.addError(`${path}.type`, 'Action type must be a string');
    return;
  }

  if (!isOneOf(ACTION_TYPES, type)) {
    collector.addError(
      `${path}.type`,
      `Invalid action type: ${type}. Valid types: ${ACTION_TYPES.join(', ')}`,
    );
    return;
  }

  if (!hasProperty(action, 'predicate')) {
    collector.addError(`${path}.predicate`, `${type} action must have a "predicate" field`);
  } else if (typeof action['predicate'] !== 'string') {
    collector.addError(`${path}.predicate`, `${type} action predicate must be a string`);
  } else if (action['predicate'].trim() === '') {
    collector.addError(`${path}.predicate`, `${type} action predicate cannot be empty`);
  }

  if (hasProperty(action, 'value')) {
    validateActionValue(action['value'], type, `${path}.value`, collector);
  } else if (!isOneOf(VALUELESS_ACTION_TYPES, type)) {
    collector.addWarning(`${path}.value`, `${type} action has no "value"; true will be asserted`);
  }

  if (hasProperty(action, 'confidence')) {
    const confidence = action['confidence'];
    if (typeof confidence !== 'number' || !Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
      collector.addError(`${path}.confidence`, 'Action confidence must be a number between 0 and 1');
    }
  }

  if (hasProperty(action, 'explanation') && typeof action['explanation'] !== 'string') {
    collector.addError(`${path}.explanation`, 'Action explanation must be a string');
  }
}

function validateActionValue(
  value: unknown,
  type: string,
  path: string,
  collector: IssueCollector,
): void {
  if (normalizeOperand(value) === undefined) {
    collector.addError(path, 'Action value must be JSON-compatible');
    return;
  }

  const name = referencedVariable(value);
  if (name !== undefined) {
    checkVariableReference(name, path, collector);
    return;
  }

  if (type === 'increment' && (typeof value !== 'number' || !Number.isFinite(value))) {
    collector.addError(path, 'increment action value must be a number');
  }
}
