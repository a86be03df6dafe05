export { SequentialIdGenerator } from './id-generator.js';
export {
  createLogger,
  silentLogger,
  errorMessage,
  LOG_LEVELS,
  type Logger,
  type LogLevel
} from './logger.js';
export {
  applyOperator,
  clearMatchesCache,
  matchesCacheSize,
  MATCHES_CACHE_LIMIT,
  type OperatorOutcome
} from './operators.js';
export { valuesEqual, deepFreeze, toNumber, stringify, toFactValue, parseBooleanText } from './values.js';
export { VARIABLE_MARKER, isValidVariableName, referencedVariable, normalizeOperand } from './variables.js';
export { version } from './version.js';
