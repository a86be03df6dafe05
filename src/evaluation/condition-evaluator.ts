import type { ConditionOperator, RuleCondition } from '../types/condition.js';
import type { Rule } from '../types/rule.js';
import type { FactValue } from '../types/fact.js';
import type { FactStore } from '../core/fact-store.js';
import type { TraceCollector } from '../debugging/trace-collector.js';
import type { ConditionTrace } from '../debugging/types.js';
import { applyOperator } from '../utils/operators.js';
import { errorMessage } from '../utils/logger.js';
import { Bindings, type ResolveResult } from './bindings.js';

/** Výsledek vyhodnocení jedné podmínky */
export type ConditionOutcome =
  | { passed: true; factId?: string }
  | { passed: false; reason: string; error?: string };

/** Výsledek vyhodnocení všech podmínek pravidla */
export interface RuleMatch {
  matched: boolean;
  bindings: Bindings;
  triggeringFactIds: string[];
}

/** Kde se podmínka nachází - pro trace */
export interface EvaluationContext {
  ruleId?: string;
  conditionIndex?: number;
}

/**
 * Vyhodnocuje podmínky pravidel proti pracovní paměti.
 *
 * Nikdy nevyhazuje výjimku - chyba se převede na nesplněnou podmínku
 * a její zpráva se uloží do trace.
 */
export class ConditionEvaluator {
  private readonly trace: ConditionTrace[] = [];

  constructor(
    private readonly facts: FactStore,
    private readonly collector?: TraceCollector
  ) {}

  /**
   * Vyhodnotí všechny podmínky pravidla (AND logika) s čerstvými vazbami.
   * Končí na první nesplněné podmínce.
   */
  evaluateAll(rule: Rule, bindings: Bindings = new Bindings()): RuleMatch {
    const triggeringFactIds: string[] = [];

    for (let i = 0; i < rule.conditions.length; i++) {
      const condition = rule.conditions[i];
      if (condition === undefined) continue;

      const outcome = this.evaluate(condition, bindings, { ruleId: rule.id, conditionIndex: i });
      if (!outcome.passed) {
        return { matched: false, bindings, triggeringFactIds };
      }
      if (outcome.factId !== undefined && !triggeringFactIds.includes(outcome.factId)) {
        triggeringFactIds.push(outcome.factId);
      }
    }

    return { matched: true, bindings, triggeringFactIds };
  }

  /**
   * Vyhodnotí jednu podmínku. Při úspěchu naváže proměnnou (`bind`).
   */
  evaluate(
    condition: RuleCondition,
    bindings: Bindings,
    context: EvaluationContext = {}
  ): ConditionOutcome {
    let expectedValue: FactValue | undefined;
    let actualValue: FactValue | undefined;
    let outcome: ConditionOutcome;

    try {
      const fact = this.facts.lookup(condition.predicate);
      actualValue = fact?.value;

      // exists / not_exists hodnotu vůbec neporovnávají
      const resolved: ResolveResult = isPresenceOperator(condition.operator)
        ? { ok: true, value: undefined }
        : bindings.resolve(condition.value);

      if (!resolved.ok) {
        outcome = { passed: false, reason: 'unbound_variable', error: resolved.error };
      } else {
        expectedValue = resolved.value;
        outcome = this.check(condition, fact?.id, actualValue, expectedValue);
      }

      if (outcome.passed && condition.bind !== undefined && fact) {
        bindings.bind(condition.bind, fact.value);
      }
    } catch (error) {
      outcome = { passed: false, reason: 'error', error: errorMessage(error) };
    }

    this.record(condition, context, expectedValue, actualValue, outcome);
    return outcome;
  }

  /**
   * Trace všech vyhodnocení od posledního resetu.
   */
  getTrace(): ConditionTrace[] {
    return [...this.trace];
  }

  reset(): void {
    this.trace.length = 0;
  }

  private check(
    condition: RuleCondition,
    factId: string | undefined,
    actualValue: FactValue | undefined,
    expectedValue: FactValue | undefined
  ): ConditionOutcome {
    const { operator } = condition;

    // Existence testuje pouze přítomnost faktu
    if (operator === 'exists') {
      return factId !== undefined
        ? { passed: true, factId }
        : { passed: false, reason: 'fact_missing' };
    }
    if (operator === 'not_exists') {
      return factId === undefined
        ? { passed: true }
        : { passed: false, reason: 'fact_present' };
    }

    if (factId === undefined || actualValue === undefined) {
      return { passed: false, reason: 'fact_missing' };
    }

    const result = applyOperator(operator, actualValue, expectedValue ?? null);
    if (!result.ok) {
      return { passed: false, reason: 'error', error: result.error };
    }
    if (!result.passed) {
      return { passed: false, reason: result.reason ?? 'comparison_failed' };
    }
    return { passed: true, factId };
  }

  private record(
    condition: RuleCondition,
    context: EvaluationContext,
    expectedValue: FactValue | undefined,
    actualValue: FactValue | undefined,
    outcome: ConditionOutcome
  ): void {
    const entry: ConditionTrace = {
      ...(context.ruleId !== undefined && { ruleId: context.ruleId }),
      conditionIndex: context.conditionIndex ?? 0,
      predicate: condition.predicate,
      operator: condition.operator,
      expectedValue,
      actualValue,
      result: outcome.passed,
      ...(!outcome.passed && { reason: outcome.reason }),
      ...(!outcome.passed && outcome.error !== undefined && { error: outcome.error })
    };

    this.trace.push(entry);
    this.collector?.record('condition_evaluated', { ...entry }, context.ruleId);
  }
}

function isPresenceOperator(operator: ConditionOperator): boolean {
  return operator === 'exists' || operator === 'not_exists';
}
