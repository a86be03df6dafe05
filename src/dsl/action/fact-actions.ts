import type { RuleActionInput, RuleActionType } from '../../types/action.js';
import type { ActionBuilder, ValueOrVar } from '../types.js';
import { normalizeValue } from '../helpers/ref.js';
import { requireInRange, requireNonEmptyString } from '../helpers/validators.js';

/**
 * Builder shared by all fact-writing actions.
 *
 * Adds optional `.confidence()` and `.because()` on top of the action
 * type, predicate and value given by the factory function.
 */
export class FactActionBuilder implements ActionBuilder {
  private confidenceValue?: number;
  private explanation?: string;

  constructor(
    private readonly type: RuleActionType,
    private readonly predicate: string,
    private readonly value?: ValueOrVar
  ) {}

  /**
   * Sets the confidence tag carried by the created fact (defaults to `1`).
   *
   * @throws {DslValidationError} If `value` is outside `[0, 1]`.
   */
  confidence(value: number): this {
    requireInRange(value, 0, 1, 'confidence()');
    this.confidenceValue = value;
    return this;
  }

  /** Sets the justification recorded on the created fact. */
  because(text: string): this {
    this.explanation = text;
    return this;
  }

  /** @returns The action input. */
  build(): RuleActionInput {
    const action: RuleActionInput = {
      type: this.type,
      predicate: this.predicate,
    };

    if (this.value !== undefined) {
      action.value = normalizeValue(this.value);
    }
    if (this.confidenceValue !== undefined) {
      action.confidence = this.confidenceValue;
    }
    if (this.explanation !== undefined) {
      action.explanation = this.explanation;
    }

    return action;
  }
}

/**
 * Creates an action that asserts a derived fact.
 *
 * @param predicate - Predicate of the new fact.
 * @param value     - Literal or {@link v} reference to a bound variable.
 *
 * @example
 * ```typescript
 * assertFact('dry_environment', true).confidence(0.9)
 * assertFact('last_reading', v('t'))
 * ```
 */
export function assertFact(predicate: string, value: ValueOrVar): FactActionBuilder {
  requireNonEmptyString(predicate, 'assertFact() predicate');
  return new FactActionBuilder('assert', predicate, value);
}

/**
 * Creates an action that asserts a conclusion, one of the facts returned
 * to the caller as the result of a query.
 *
 * @example
 * ```typescript
 * conclude('diagnosis', 'overwatering').because('Soil is wet and leaves are yellow')
 * ```
 */
export function conclude(predicate: string, value: ValueOrVar): FactActionBuilder {
  requireNonEmptyString(predicate, 'conclude() predicate');
  return new FactActionBuilder('conclude', predicate, value);
}

/**
 * Creates an action that asserts a recommendation. The fact is stored as a
 * conclusion under the engine's recommendation prefix.
 *
 * @example
 * ```typescript
 * recommend('ideal_plant', 'Aloe vera').confidence(0.93)
 * ```
 */
export function recommend(predicate: string, value: ValueOrVar): FactActionBuilder {
  requireNonEmptyString(predicate, 'recommend() predicate');
  return new FactActionBuilder('recommend', predicate, value);
}

/**
 * Creates an action that sets a working variable, stored as a derived fact.
 */
export function setVar(predicate: string, value: ValueOrVar): FactActionBuilder {
  requireNonEmptyString(predicate, 'setVar() predicate');
  return new FactActionBuilder('set', predicate, value);
}

/**
 * Creates an action that adds `step` to the current numeric fact.
 * Does nothing when the fact is absent or not numeric.
 *
 * @param step - Number or {@link v} reference (defaults to `1`).
 */
export function increment(predicate: string, step?: ValueOrVar): FactActionBuilder {
  requireNonEmptyString(predicate, 'increment() predicate');
  return new FactActionBuilder('increment', predicate, step);
}

/**
 * Creates a retract action. Retraction is accepted for rule compatibility
 * but has no effect on working memory; the trace records it as skipped.
 */
export function retract(predicate: string): FactActionBuilder {
  requireNonEmptyString(predicate, 'retract() predicate');
  return new FactActionBuilder('retract', predicate);
}
