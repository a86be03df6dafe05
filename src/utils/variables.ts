import type { Operand } from '../types/condition.js';
import { isVariableRef } from '../evaluation/bindings.js';
import { toFactValue } from './values.js';

/**
 * Autorská syntaxe proměnných v pravidlech:
 *
 * - `"$x"`  → reference na proměnnou `x`
 * - `"$$x"` → literál `"$x"`
 * - `{ var: "x" }` → reference (interní podoba)
 */
export const VARIABLE_MARKER = '$';

const VARIABLE_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidVariableName(name: string): boolean {
  return VARIABLE_NAME_RE.test(name);
}

/**
 * Vrátí jméno proměnné, na kterou hodnota odkazuje, jinak undefined.
 */
export function referencedVariable(value: unknown): string | undefined {
  if (isVariableRef(value)) {
    return value.var;
  }
  if (typeof value === 'string' && value.startsWith(VARIABLE_MARKER) && !value.startsWith('$$')) {
    return value.slice(VARIABLE_MARKER.length);
  }
  return undefined;
}

/**
 * Převede autorskou hodnotu na operand. `$x` se stane `{ var: 'x' }`,
 * `$$x` literálem `$x`. Vrací undefined pro hodnoty, které nejsou
 * JSON-kompatibilní.
 */
export function normalizeOperand(value: unknown): Operand | undefined {
  const name = referencedVariable(value);
  if (name !== undefined) {
    return { var: name };
  }
  if (typeof value === 'string' && value.startsWith('$$')) {
    return value.slice(1);
  }
  return toFactValue(value);
}
