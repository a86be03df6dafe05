/**
 * Error thrown when rule input does not pass validation.
 *
 * Compatible with the API error handler (`statusCode` + `code` pattern).
 *
 * @module
 */

import type { ValidationIssue, ValidationResult } from './types.js';

export class RuleValidationError extends Error {
  readonly statusCode = 400;
  readonly code = 'RULE_VALIDATION_ERROR';
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.name = 'RuleValidationError';
    this.issues = issues;
  }

  /**
   * Builds the error from a failed validation result.
   *
   * The message names the subject and the first error; all errors are kept
   * in {@link issues}.
   */
  static fromResult(subject: string, result: ValidationResult): RuleValidationError {
    const [first] = result.errors;
    const summary = first ? `${first.path}: ${first.message}` : 'unknown error';
    const more = result.errors.length > 1 ? ` (+${result.errors.length - 1} more)` : '';
    return new RuleValidationError(`${subject} is invalid: ${summary}${more}`, result.errors);
  }

  /** Exposes issues as `details` for the API error handler. */
  get details(): ValidationIssue[] {
    return this.issues;
  }
}
