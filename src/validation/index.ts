/**
 * Shared rule validation module.
 *
 * @module
 */

// Types
export type { ValidationIssue, ValidationResult } from './types.js';

// Constants
export {
  CONDITION_OPERATORS,
  UNARY_OPERATORS,
  ACTION_TYPES,
  VALUELESS_ACTION_TYPES,
} from './constants.js';

// Validator
export { RuleInputValidator } from './rule-validator.js';
export type { ValidatorOptions } from './rule-validator.js';

// Error
export { RuleValidationError } from './rule-validation-error.js';
