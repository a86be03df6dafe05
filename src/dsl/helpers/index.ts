export { v, normalizeValue } from './ref.js';
export {
  requireNonEmptyString,
  requireFiniteNumber,
  requireInRange,
  requireVariableName
} from './validators.js';
export { DslError, DslValidationError } from './errors.js';
