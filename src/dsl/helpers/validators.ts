/**
 * Validation helpers for DSL builder inputs.
 *
 * These guards enforce a fail-fast approach: invalid input is rejected
 * at the call-site rather than deferred until `build()`.
 *
 * @module
 */

import { DslValidationError } from './errors.js';
import { isValidVariableName } from '../../utils/variables.js';

/**
 * Asserts that `value` is a non-empty string.
 *
 * @param label - A human-readable parameter name used in the error message.
 * @throws {DslValidationError} If `value` is not a string or is empty.
 */
export function requireNonEmptyString(value: unknown, label: string): asserts value is string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new DslValidationError(`${label} must be a non-empty string`);
  }
}

/**
 * Asserts that `value` is a finite number.
 *
 * @throws {DslValidationError} If `value` is not a finite number.
 */
export function requireFiniteNumber(value: unknown, label: string): asserts value is number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new DslValidationError(`${label} must be a finite number`);
  }
}

/**
 * Asserts that `value` is a number within `[min, max]`.
 *
 * @throws {DslValidationError} If `value` is out of range.
 */
export function requireInRange(value: unknown, min: number, max: number, label: string): asserts value is number {
  requireFiniteNumber(value, label);
  if (value < min || value > max) {
    throw new DslValidationError(`${label} must be between ${min} and ${max}, got ${value}`);
  }
}

/**
 * Asserts that `value` is a valid variable name (`[A-Za-z_][A-Za-z0-9_]*`).
 *
 * @throws {DslValidationError} If `value` is not a valid variable name.
 */
export function requireVariableName(value: unknown, label: string): asserts value is string {
  if (typeof value !== 'string' || !isValidVariableName(value)) {
    throw new DslValidationError(
      `${label} must be a valid variable name, got ${JSON.stringify(value)}`,
    );
  }
}
