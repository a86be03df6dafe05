/**
 * Main rule input validator.
 *
 * Validates one or many rule inputs and returns all issues (errors + warnings)
 * rather than throwing on the first problem. Shared by the knowledge base,
 * the YAML loader, the HTTP layer and the CLI `validate` command.
 *
 * @module
 */

import { IssueCollector, isObject, hasProperty } from './types.js';
import type { ValidationResult } from './types.js';
import { validateConditions } from './validators/condition.js';
import { validateActions } from './validators/action.js';

/** Options for {@link RuleInputValidator}. */
export interface ValidatorOptions {
  /** When true, reports variables that are bound but never referenced. */
  strict?: boolean;
}

type RuleRecord = Record<string, unknown>;

const NUMERIC_FIELDS = ['priority', 'specificity', 'complexity'] as const;
const STRING_FIELDS = ['name', 'description', 'domain', 'source'] as const;

/**
 * Validates rule inputs against the expected schema.
 *
 * ```ts
 * const v = new RuleInputValidator();
 * const result = v.validate(unknownInput);
 * if (!result.valid) { … }
 * ```
 */
export class RuleInputValidator {
  private readonly strict: boolean;

  constructor(options: ValidatorOptions = {}) {
    this.strict = options.strict ?? false;
  }

  /** Validates a single rule input. */
  validate(input: unknown): ValidationResult {
    const collector = new IssueCollector();

    if (!isObject(input)) {
      collector.addError('', 'Rule must be an object');
      return collector.toResult();
    }

    this.validateRule(input, '', collector);
    return collector.toResult();
  }

  /** Validates an array of rule inputs, including duplicate-ID detection. */
  validateMany(inputs: unknown): ValidationResult {
    const collector = new IssueCollector();

    if (!Array.isArray(inputs)) {
      collector.addError('', 'Input must be an array of rules');
      return collector.toResult();
    }

    const ids = new Set<string>();

    for (let i = 0; i < inputs.length; i++) {
      const rule = inputs[i];
      const prefix = `[${i}]`;

      if (!isObject(rule)) {
        collector.addError(prefix, 'Rule must be an object');
        continue;
      }

      if (hasProperty(rule, 'id') && typeof rule['id'] === 'string') {
        const id = rule['id'];
        if (ids.has(id)) {
          collector.addError(`${prefix}.id`, `Duplicate rule ID: ${id}`);
        } else {
          ids.add(id);
        }
      }

      this.validateRule(rule, prefix, collector);
    }

    return collector.toResult();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private validateRule(rule: RuleRecord, prefix: string, collector: IssueCollector): void {
    collector.clearVariables();
    this.validateRequiredFields(rule, prefix, collector);
    this.validateOptionalFields(rule, prefix, collector);

    // Podmínky před akcemi - akce vidí všechny vazby
    if (hasProperty(rule, 'conditions')) {
      validateConditions(rule['conditions'], this.fieldPath(prefix, 'conditions'), collector);
    }

    if (hasProperty(rule, 'actions')) {
      validateActions(rule['actions'], this.fieldPath(prefix, 'actions'), collector);
    }

    if (this.strict) {
      this.checkUnusedVariables(prefix, collector);
    }
  }

  private validateRequiredFields(
    rule: RuleRecord,
    prefix: string,
    collector: IssueCollector,
  ): void {
    if (!hasProperty(rule, 'id')) {
      collector.addError(this.fieldPath(prefix, 'id'), 'Required field "id" is missing');
    } else if (typeof rule['id'] !== 'string') {
      collector.addError(this.fieldPath(prefix, 'id'), 'Field "id" must be a string');
    } else if (rule['id'].trim() === '') {
      collector.addError(this.fieldPath(prefix, 'id'), 'Field "id" cannot be empty');
    }

    if (!hasProperty(rule, 'conditions')) {
      collector.addError(this.fieldPath(prefix, 'conditions'), 'Required field "conditions" is missing');
    }

    if (!hasProperty(rule, 'actions')) {
      collector.addError(this.fieldPath(prefix, 'actions'), 'Required field "actions" is missing');
    }
  }

  private validateOptionalFields(
    rule: RuleRecord,
    prefix: string,
    collector: IssueCollector,
  ): void {
    for (const field of STRING_FIELDS) {
      if (hasProperty(rule, field) && typeof rule[field] !== 'string') {
        collector.addError(this.fieldPath(prefix, field), `Field "${field}" must be a string`);
      }
    }

    for (const field of NUMERIC_FIELDS) {
      if (hasProperty(rule, field)) {
        const value = rule[field];
        if (typeof value !== 'number' || !Number.isFinite(value)) {
          collector.addError(this.fieldPath(prefix, field), `Field "${field}" must be a number`);
        } else if (field !== 'priority' && (!Number.isInteger(value) || value < 0)) {
          collector.addError(
            this.fieldPath(prefix, field),
            `Field "${field}" must be a non-negative integer`,
          );
        }
      }
    }

    if (hasProperty(rule, 'active') && typeof rule['active'] !== 'boolean') {
      collector.addError(this.fieldPath(prefix, 'active'), 'Field "active" must be a boolean');
    }

    if (hasProperty(rule, 'tags')) {
      const tags = rule['tags'];
      if (!Array.isArray(tags)) {
        collector.addError(this.fieldPath(prefix, 'tags'), 'Field "tags" must be an array');
      } else {
        for (let i = 0; i < tags.length; i++) {
          if (typeof tags[i] !== 'string') {
            collector.addError(this.fieldPath(prefix, `tags[${i}]`), 'Tag must be a string');
          }
        }
      }
    }
  }

  private checkUnusedVariables(prefix: string, collector: IssueCollector): void {
    for (const name of collector.boundVariables) {
      if (!collector.usedVariables.has(name)) {
        collector.addWarning(
          this.fieldPath(prefix, 'conditions'),
          `Variable "$${name}" is bound but never used`,
        );
      }
    }
  }

  private fieldPath(prefix: string, field: string): string {
    return prefix ? `${prefix}.${field}` : field;
  }
}
