import type { VariableRef } from '../../types/condition.js';
import type { ValueOrVar } from '../types.js';
import { isVariableRef } from '../../evaluation/bindings.js';
import { VARIABLE_MARKER } from '../../utils/variables.js';
import { requireVariableName } from './validators.js';

/**
 * Creates a reference to a variable bound by an earlier condition.
 *
 * @param name - Variable name as given to `.as()` on a condition.
 * @returns A {@link VariableRef} resolved during rule evaluation.
 *
 * @example
 * fact('temperature').as('t')
 * assertFact('last_temperature', v('t'))
 */
export function v(name: string): VariableRef {
  requireVariableName(name, 'v() name');
  return { var: name };
}

/**
 * Normalizes a DSL value into rule input.
 *
 * Variable references pass through unchanged. A literal string that starts
 * with the variable marker is escaped so that it stays a literal once the
 * rule is created.
 *
 * @param value - A literal or a variable reference.
 * @returns The value as it should appear in rule input.
 */
export function normalizeValue(value: ValueOrVar): ValueOrVar {
  if (isVariableRef(value)) {
    return { var: value.var };
  }
  if (typeof value === 'string' && value.startsWith(VARIABLE_MARKER)) {
    return `${VARIABLE_MARKER}${value}`;
  }
  return value;
}
