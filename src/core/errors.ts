/**
 * Chyby jádra. Kompatibilní s API error handlerem (`statusCode` + `code`).
 */

export class DuplicateRuleError extends Error {
  readonly statusCode = 409;
  readonly code = 'DUPLICATE_RULE';

  constructor(readonly ruleId: string) {
    super(`Rule "${ruleId}" is already registered`);
    this.name = 'DuplicateRuleError';
  }
}

/** Dotaz běží - instance zpracovává vždy jen jeden */
export class EngineBusyError extends Error {
  readonly statusCode = 409;
  readonly code = 'ENGINE_BUSY';

  constructor(engineName: string) {
    super(`Engine "${engineName}" is already running a query`);
    this.name = 'EngineBusyError';
  }
}

export class InvalidConfigError extends Error {
  readonly statusCode = 400;
  readonly code = 'INVALID_CONFIG';

  constructor(readonly field: string, message: string) {
    super(`Invalid config "${field}": ${message}`);
    this.name = 'InvalidConfigError';
  }
}
