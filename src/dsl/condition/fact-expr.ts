import type { ConditionOperator, RuleConditionInput } from '../../types/condition.js';
import type { ConditionBuilder, ValueOrVar } from '../types.js';
import { normalizeValue } from '../helpers/ref.js';
import { DslValidationError } from '../helpers/errors.js';
import { requireNonEmptyString, requireVariableName } from '../helpers/validators.js';

/**
 * Fluent condition expression over one predicate of working memory.
 *
 * Created via the {@link fact} helper. Call exactly one operator method,
 * optionally bind the matched value with {@link FactExpr.as}, then pass the
 * expression to {@link RuleBuilder.if} or {@link RuleBuilder.and}.
 *
 * @example
 * ```typescript
 * fact('location').eq('indoor')
 * fact('temperature').gte(18).as('t').weight(2)
 * fact('room').in(['kitchen', 'bathroom']).because('Humid rooms')
 * ```
 */
export class FactExpr implements ConditionBuilder {
  private operator?: ConditionOperator;
  private value?: ValueOrVar;
  private bindName?: string;
  private weightValue?: number;
  private explanation?: string;

  constructor(private readonly predicate: string) {}

  /** Equal: structural equality with `value`. */
  eq(value: ValueOrVar): this {
    return this.compare('eq', value);
  }

  /** Not equal. */
  neq(value: ValueOrVar): this {
    return this.compare('neq', value);
  }

  /** Greater than; both sides are compared as numbers. */
  gt(value: ValueOrVar): this {
    return this.compare('gt', value);
  }

  /** Greater than or equal. */
  gte(value: ValueOrVar): this {
    return this.compare('gte', value);
  }

  /** Less than. */
  lt(value: ValueOrVar): this {
    return this.compare('lt', value);
  }

  /** Less than or equal. */
  lte(value: ValueOrVar): this {
    return this.compare('lte', value);
  }

  /**
   * Membership: matches when the fact value is one of `values`.
   *
   * @param values - Array literal, or a string searched as a substring.
   */
  in(values: ValueOrVar): this {
    return this.compare('in', values);
  }

  /** Exclusion: matches when the fact value is NOT one of `values`. */
  notIn(values: ValueOrVar): this {
    return this.compare('not_in', values);
  }

  /** Matches when the fact value (array or string) contains `value`. */
  contains(value: ValueOrVar): this {
    return this.compare('contains', value);
  }

  /**
   * Regex match against the fact value as a string.
   *
   * @param pattern - A regex string or `RegExp` (only the `source` is used).
   */
  matches(pattern: string | RegExp): this {
    return this.compare('matches', pattern instanceof RegExp ? pattern.source : pattern);
  }

  /** Matches when any fact exists for the predicate. */
  exists(): this {
    return this.compare('exists', null);
  }

  /** Matches when no fact exists for the predicate. */
  notExists(): this {
    return this.compare('not_exists', null);
  }

  /**
   * Binds the matched fact value to a variable usable by later conditions
   * and by the rule's actions.
   *
   * @param name - Variable name (`[A-Za-z_][A-Za-z0-9_]*`).
   * @throws {DslValidationError} If `name` is not a valid variable name.
   */
  as(name: string): this {
    requireVariableName(name, 'as() name');
    this.bindName = name;
    return this;
  }

  /**
   * Sets the condition weight (defaults to `1`).
   *
   * @throws {DslValidationError} If `value` is not a positive number.
   */
  weight(value: number): this {
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      throw new DslValidationError('weight() must be a positive number');
    }
    this.weightValue = value;
    return this;
  }

  /** Attaches a human-readable explanation. */
  because(text: string): this {
    this.explanation = text;
    return this;
  }

  /**
   * Builds the final condition input.
   *
   * @throws {DslValidationError} If no operator has been set.
   */
  build(): RuleConditionInput {
    if (!this.operator) {
      throw new DslValidationError(
        `Condition on fact("${this.predicate}") has no operator. Call .eq(), .gte(), .exists(), etc.`,
      );
    }

    const condition: RuleConditionInput = {
      predicate: this.predicate,
      operator: this.operator,
    };

    if (this.value !== undefined && this.operator !== 'exists' && this.operator !== 'not_exists') {
      condition.value = this.value;
    }
    if (this.bindName !== undefined) {
      condition.bind = this.bindName;
    }
    if (this.weightValue !== undefined) {
      condition.weight = this.weightValue;
    }
    if (this.explanation !== undefined) {
      condition.explanation = this.explanation;
    }

    return condition;
  }

  private compare(operator: ConditionOperator, value: ValueOrVar): this {
    if (this.operator !== undefined) {
      throw new DslValidationError(
        `Condition on fact("${this.predicate}") already uses operator "${this.operator}"`,
      );
    }
    this.operator = operator;
    this.value = normalizeValue(value);
    return this;
  }
}

/**
 * Creates a {@link FactExpr} over the latest fact for `predicate`.
 *
 * @param predicate - Name of the predicate in working memory.
 * @returns A {@link FactExpr} ready for operator chaining.
 *
 * @example
 * fact('location').eq('indoor')
 * fact('light').in(['high', 'medium'])
 */
export function fact(predicate: string): FactExpr {
  requireNonEmptyString(predicate, 'fact() predicate');
  return new FactExpr(predicate);
}
