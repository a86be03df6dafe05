import type { RuleConditionInput } from '../../types/condition.js';
import type { RuleActionInput } from '../../types/action.js';
import type { ConditionBuilder, ActionBuilder, RuleBuildContext, BuiltRule } from '../types.js';
import { DslValidationError } from '../helpers/errors.js';
import { requireFiniteNumber, requireNonEmptyString } from '../helpers/validators.js';

/**
 * Fluent builder for assembling rule definitions.
 *
 * Use the static {@link RuleBuilder.create} method (also exported as `Rule`)
 * as the entry point, then chain configuration methods and finish with
 * {@link RuleBuilder.build}.
 *
 * @example
 * ```typescript
 * Rule.create('R001')
 *   .name('Dry indoor air in winter')
 *   .domain('environment')
 *   .if(fact('location').eq('indoor'))
 *   .and(fact('heating').eq('high'))
 *   .then(assertFact('dry_environment', true).confidence(0.9))
 *   .build();
 * ```
 */
export class RuleBuilder {
  private ctx: RuleBuildContext;

  private constructor(id: string) {
    this.ctx = {
      id,
      tags: [],
      conditions: [],
      actions: [],
    };
  }

  /**
   * Creates a new rule builder with the given unique identifier.
   *
   * @param id - Unique rule identifier (must be a non-empty string).
   * @throws {DslValidationError} If `id` is empty or not a string.
   */
  static create(id: string): RuleBuilder {
    if (!id || typeof id !== 'string') {
      throw new DslValidationError('Rule ID must be a non-empty string');
    }
    return new RuleBuilder(id);
  }

  /**
   * Sets a human-readable name for the rule (defaults to the rule ID).
   */
  name(value: string): this {
    this.ctx.name = value;
    return this;
  }

  description(value: string): this {
    this.ctx.description = value;
    return this;
  }

  /**
   * Sets the knowledge domain the rule belongs to (e.g. `"environment"`).
   */
  domain(value: string): this {
    requireNonEmptyString(value, 'domain()');
    this.ctx.domain = value;
    return this;
  }

  /**
   * Records where the knowledge comes from (a book, an expert, a dataset).
   */
  source(value: string): this {
    this.ctx.source = value;
    return this;
  }

  /**
   * Sets the explicit priority used by the `priority` strategy
   * (higher value wins, defaults to `0`).
   *
   * @throws {DslValidationError} If `value` is not a finite number.
   */
  priority(value: number): this {
    requireFiniteNumber(value, 'Priority');
    this.ctx.priority = value;
    return this;
  }

  /**
   * Overrides the specificity (defaults to the number of conditions).
   *
   * @throws {DslValidationError} If `value` is not a non-negative integer.
   */
  specificity(value: number): this {
    this.ctx.specificity = requireCount(value, 'Specificity');
    return this;
  }

  /**
   * Overrides the complexity (defaults to conditions + actions).
   *
   * @throws {DslValidationError} If `value` is not a non-negative integer.
   */
  complexity(value: number): this {
    this.ctx.complexity = requireCount(value, 'Complexity');
    return this;
  }

  /**
   * Activates or deactivates the rule (defaults to `true`).
   */
  active(value: boolean): this {
    this.ctx.active = value;
    return this;
  }

  /**
   * Appends one or more tags for categorization / filtering.
   */
  tags(...values: string[]): this {
    this.ctx.tags.push(...values);
    return this;
  }

  /**
   * Adds a condition that must be satisfied for the rule to fire.
   * Conditions are evaluated in the order they are added.
   *
   * @param condition - A {@link ConditionBuilder} (e.g. `fact('x').gte(1)`)
   *                    or a raw condition input.
   */
  if(condition: ConditionBuilder | RuleConditionInput): this {
    const built = 'build' in condition ? condition.build() : condition;
    this.ctx.conditions.push(built);
    return this;
  }

  /**
   * Alias for {@link RuleBuilder.if}: adds another condition (logical AND).
   */
  and(condition: ConditionBuilder | RuleConditionInput): this {
    return this.if(condition);
  }

  /**
   * Adds an action to execute when the rule fires.
   *
   * @param action - An {@link ActionBuilder} (e.g. `conclude(...)`) or a raw
   *                 action input.
   */
  then(action: ActionBuilder | RuleActionInput): this {
    const built = 'build' in action ? action.build() : action;
    this.ctx.actions.push(built);
    return this;
  }

  /**
   * Alias for {@link RuleBuilder.then}: adds another action.
   */
  also(action: ActionBuilder | RuleActionInput): this {
    return this.then(action);
  }

  /**
   * Validates the accumulated state and returns the final rule definition.
   *
   * @throws {DslValidationError} If the rule has no condition or no action.
   */
  build(): BuiltRule {
    if (this.ctx.conditions.length === 0) {
      throw new DslValidationError(`Rule "${this.ctx.id}": at least one condition is required. Use .if()`);
    }

    if (this.ctx.actions.length === 0) {
      throw new DslValidationError(`Rule "${this.ctx.id}": at least one action is required. Use .then()`);
    }

    const rule: BuiltRule = {
      id: this.ctx.id,
      name: this.ctx.name ?? this.ctx.id,
      priority: this.ctx.priority ?? 0,
      active: this.ctx.active ?? true,
      tags: [...this.ctx.tags],
      conditions: [...this.ctx.conditions],
      actions: [...this.ctx.actions],
    };

    if (this.ctx.description !== undefined) rule.description = this.ctx.description;
    if (this.ctx.domain !== undefined) rule.domain = this.ctx.domain;
    if (this.ctx.source !== undefined) rule.source = this.ctx.source;
    if (this.ctx.specificity !== undefined) rule.specificity = this.ctx.specificity;
    if (this.ctx.complexity !== undefined) rule.complexity = this.ctx.complexity;

    return rule;
  }
}

function requireCount(value: number, label: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new DslValidationError(`${label} must be a non-negative integer`);
  }
  return value;
}

/**
 * Entry-point alias for {@link RuleBuilder}.
 *
 * @example
 * ```typescript
 * const myRule = Rule.create('my-rule')
 *   .if(fact('location').eq('indoor'))
 *   .then(assertFact('indoor', true))
 *   .build();
 * ```
 */
export const Rule = RuleBuilder;
