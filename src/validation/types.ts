/**
 * Validation types and internal utilities.
 *
 * @module
 */

/** Single validation issue (error or warning). */
export interface ValidationIssue {
  path: string;
  message: string;
  severity: 'error' | 'warning';
}

/** Result of a validation run. */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * Internal helper for accumulating validation issues.
 *
 * Sub-validators receive an instance and call {@link addError}/{@link addWarning}.
 * Variable tracking (`boundVariables` / `usedVariables`) follows condition
 * order, so a reference can be checked against the variables bound by the
 * conditions before it.
 */
export class IssueCollector {
  private readonly _errors: ValidationIssue[] = [];
  private readonly _warnings: ValidationIssue[] = [];

  readonly boundVariables = new Set<string>();
  readonly usedVariables = new Set<string>();

  addError(path: string, message: string): void {
    this._errors.push({ path: path || '(root)', message, severity: 'error' });
  }

  addWarning(path: string, message: string): void {
    this._warnings.push({ path: path || '(root)', message, severity: 'warning' });
  }

  clearVariables(): void {
    this.boundVariables.clear();
    this.usedVariables.clear();
  }

  toResult(): ValidationResult {
    return {
      valid: this._errors.length === 0,
      errors: [...this._errors],
      warnings: [...this._warnings],
    };
  }
}

/** Type guard: value is a non-null, non-array object. */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Checks whether `obj` has a given property (non-null, non-array object check included). */
export function hasProperty(obj: unknown, prop: string): boolean {
  return isObject(obj) && prop in obj;
}

/** Type guard for membership in a readonly tuple of string literals. */
export function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && values.some(v => v === value);
}
