import type { RuleAction, ActionOutcome } from '../types/action.js';
import type { FactValue } from '../types/fact.js';
import type { FactStore } from '../core/fact-store.js';
import type { TraceCollector } from '../debugging/trace-collector.js';
import type { ActionTrace } from '../debugging/types.js';
import { errorMessage, type Logger } from '../utils/logger.js';
import { toNumber } from '../utils/values.js';
import type { Bindings } from './bindings.js';

export const DEFAULT_RECOMMENDATION_PREFIX = 'recommendation:';

export interface ActionExecutorOptions {
  /** Prefix predikátu pro akce recommend */
  recommendationPrefix?: string;
  logger?: Logger;
  collector?: TraceCollector;
}

/**
 * Provádí akce pravidel nad pracovní pamětí.
 *
 * Každé provedení (vytvoření faktu, no-op i chyba) zanechá jeden záznam
 * v trace. Chyba se nikdy nešíří ven - vrací se jako `failed`.
 */
export class ActionExecutor {
  private readonly trace: ActionTrace[] = [];
  private readonly recommendationPrefix: string;
  private readonly logger: Logger;
  private readonly collector: TraceCollector | undefined;

  constructor(
    private readonly facts: FactStore,
    options: ActionExecutorOptions = {}
  ) {
    this.recommendationPrefix = options.recommendationPrefix ?? DEFAULT_RECOMMENDATION_PREFIX;
    this.logger = options.logger ?? console;
    this.collector = options.collector;
  }

  /**
   * Provede jednu akci s navázanými proměnnými.
   */
  execute(action: RuleAction, bindings: Bindings, ruleId: string, actionIndex = 0): ActionOutcome {
    let resolvedValue: FactValue | undefined;
    let outcome: ActionOutcome;

    try {
      const resolved = bindings.resolve(action.value);
      if (!resolved.ok) {
        outcome = { status: 'failed', error: resolved.error };
      } else {
        resolvedValue = resolved.value;
        outcome = this.dispatch(action, resolvedValue, ruleId);
      }
    } catch (error) {
      outcome = { status: 'failed', error: errorMessage(error) };
    }

    if (outcome.status === 'failed') {
      this.logger.warn(
        `Action ${actionIndex} (${action.type} ${action.predicate}) of rule "${ruleId}" failed: ${outcome.error}`
      );
    }

    this.record(action, ruleId, actionIndex, resolvedValue, outcome);
    return outcome;
  }

  /**
   * Trace všech provedení od posledního resetu.
   */
  getTrace(): ActionTrace[] {
    return [...this.trace];
  }

  reset(): void {
    this.trace.length = 0;
  }

  private dispatch(action: RuleAction, value: FactValue | undefined, ruleId: string): ActionOutcome {
    const justification = action.explanation !== '' ? action.explanation : `Derived by rule ${ruleId}`;
    // Akce bez hodnoty zapisuje příznak
    const factValue = value ?? true;

    switch (action.type) {
      case 'assert':
      case 'set':
        return {
          status: 'created',
          factId: this.facts.assertDerived(action.predicate, factValue, ruleId, justification, action.confidence)
        };

      case 'conclude':
        return {
          status: 'created',
          factId: this.facts.assertConclusion(action.predicate, factValue, ruleId, justification, action.confidence)
        };

      case 'recommend':
        return {
          status: 'created',
          factId: this.facts.assertConclusion(
            `${this.recommendationPrefix}${action.predicate}`,
            factValue,
            ruleId,
            justification,
            action.confidence
          )
        };

      case 'increment':
        return this.increment(action, value, ruleId, justification);

      case 'retract':
        // Bez truth maintenance - nic se neodstraňuje
        return { status: 'skipped', reason: 'retract_not_supported' };

      default: {
        const unreachable: never = action.type;
        return { status: 'failed', error: `Unknown action type: ${String(unreachable)}` };
      }
    }
  }

  private increment(
    action: RuleAction,
    value: FactValue | undefined,
    ruleId: string,
    justification: string
  ): ActionOutcome {
    const step = value === undefined ? 1 : toNumber(value);
    if (step === undefined) {
      return { status: 'failed', error: `Increment step for "${action.predicate}" is not numeric` };
    }

    const current = this.facts.lookup(action.predicate);
    if (!current) {
      return { status: 'skipped', reason: 'fact_missing' };
    }
    const base = toNumber(current.value);
    if (base === undefined) {
      return { status: 'skipped', reason: 'not_numeric' };
    }

    return {
      status: 'created',
      factId: this.facts.assertDerived(action.predicate, base + step, ruleId, justification, action.confidence)
    };
  }

  private record(
    action: RuleAction,
    ruleId: string,
    actionIndex: number,
    resolvedValue: FactValue | undefined,
    outcome: ActionOutcome
  ): void {
    const entry: ActionTrace = {
      ruleId,
      actionIndex,
      actionType: action.type,
      predicate: action.predicate,
      resolvedValue,
      status: outcome.status,
      ...(outcome.status === 'created' && { factId: outcome.factId }),
      ...(outcome.status === 'skipped' && { reason: outcome.reason }),
      ...(outcome.status === 'failed' && { error: outcome.error })
    };

    this.trace.push(entry);
    this.collector?.record('action_executed', { ...entry }, ruleId);
  }
}
