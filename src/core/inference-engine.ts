import type { Activation } from '../types/activation.js';
import type { Fact } from '../types/fact.js';
import type { Rule } from '../types/rule.js';
import type { KnowledgeSource } from '../types/knowledge.js';
import type { Conclusion, EngineState, QueryInput, QueryResult } from '../types/result.js';
import type { EngineStats, InferenceEngineConfig } from '../types/index.js';
import type { CycleTrace, TraceSubscriber } from '../debugging/types.js';
import { TraceCollector } from '../debugging/trace-collector.js';
import { ConditionEvaluator } from '../evaluation/condition-evaluator.js';
import { ActionExecutor } from '../evaluation/action-executor.js';
import { Bindings } from '../evaluation/bindings.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';
import { FactStore } from './fact-store.js';
import { Agenda } from './agenda.js';
import { resolveEngineConfig, type ResolvedEngineConfig } from './engine-config.js';
import { EngineBusyError } from './errors.js';

interface EngineInternals {
  queriesRun: number;
  totalCycles: number;
  totalRulesFired: number;
  lastElapsedMillis: number;
}

/** Průběžný stav jednoho dotazu */
interface QueryProgress {
  cyclesExecuted: number;
  rulesFired: number;
  factsDerived: number;
  cycles: CycleTrace[];
}

export const TERMINATION_AGENDA_EMPTY = 'agenda empty';
export const TERMINATION_CYCLE_LIMIT = 'cycle limit reached';

/**
 * Dopředně řetězící inferenční engine.
 *
 * Každý dotaz projde cyklem Match → Resolve → Act, dokud agenda není
 * prázdná nebo není dosažen limit cyklů. Pracovní paměť, agenda i trace
 * patří instanci a před každým dotazem se resetují.
 *
 * Stavy: idle → running → completed | aborted. Z koncového stavu lze
 * spustit další dotaz.
 */
export class InferenceEngine {
  private readonly config: ResolvedEngineConfig;
  private readonly logger: Logger;
  private readonly factStore: FactStore;
  private readonly agenda: Agenda;
  private readonly traceCollector: TraceCollector;
  private readonly conditionEvaluator: ConditionEvaluator;
  private readonly actionExecutor: ActionExecutor;

  private state: EngineState = 'idle';

  private readonly internals: EngineInternals = {
    queriesRun: 0,
    totalCycles: 0,
    totalRulesFired: 0,
    lastElapsedMillis: 0
  };

  constructor(config: InferenceEngineConfig = {}) {
    this.config = resolveEngineConfig(config);
    this.logger = createLogger(this.config.name, this.config.logLevel, this.config.logger);

    this.factStore = new FactStore({ name: `${this.config.name}-facts`, logger: this.logger });
    this.agenda = new Agenda(this.config.strategy);
    this.traceCollector = new TraceCollector(this.logger);
    this.conditionEvaluator = new ConditionEvaluator(this.factStore, this.traceCollector);
    this.actionExecutor = new ActionExecutor(this.factStore, {
      recommendationPrefix: this.config.recommendationPrefix,
      logger: this.logger,
      collector: this.traceCollector
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // QUERY
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Spustí dotaz nad zdrojem znalostí.
   *
   * Chyby jednotlivých podmínek, akcí a chybějící pravidla se zotaví
   * lokálně a zapíší do trace. Cokoliv jiného dotaz ukončí ve stavu
   * `aborted` - výsledek přesto obsahuje dosavadní závěry a trace.
   *
   * @throws {EngineBusyError} Pokud instance právě zpracovává jiný dotaz
   */
  runQuery(source: KnowledgeSource, initialFacts: QueryInput): QueryResult {
    if (this.state === 'running') {
      throw new EngineBusyError(this.config.name);
    }

    this.state = 'running';
    this.resetQueryState();
    const startTime = performance.now();

    const progress: QueryProgress = {
      cyclesExecuted: 0,
      rulesFired: 0,
      factsDerived: 0,
      cycles: []
    };

    let terminationReason: string;
    let finalState: QueryResult['state'];

    try {
      this.traceCollector.record('query_started', {
        strategy: this.config.strategy,
        maxCycles: this.config.maxCycles,
        initialFacts: Object.keys(initialFacts).length
      });

      for (const [predicate, value] of Object.entries(initialFacts)) {
        this.factStore.assertInitial(predicate, value);
      }

      terminationReason = this.runCycles(source, progress);
      finalState = 'completed';
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Query aborted: ${message}`);
      this.traceCollector.record('engine_error', { error: message });
      terminationReason = `error: ${message}`;
      finalState = 'aborted';
    }

    const elapsedMillis = performance.now() - startTime;
    this.traceCollector.record('query_finished', {
      state: finalState,
      terminationReason,
      cyclesExecuted: progress.cyclesExecuted,
      rulesFired: progress.rulesFired
    });

    this.state = finalState;
    this.internals.queriesRun++;
    this.internals.totalCycles += progress.cyclesExecuted;
    this.internals.totalRulesFired += progress.rulesFired;
    this.internals.lastElapsedMillis = elapsedMillis;

    this.logger.info(
      `Query ${finalState} (${terminationReason}) after ${progress.cyclesExecuted} cycles, ` +
      `${progress.rulesFired} rules fired`
    );

    return this.buildResult(finalState, terminationReason, progress, elapsedMillis);
  }

  /**
   * Odebírá trace záznamy v reálném čase.
   */
  onTrace(subscriber: TraceSubscriber): () => void {
    return this.traceCollector.subscribe(subscriber);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // ACCESSORS
  // ═══════════════════════════════════════════════════════════════════════════

  getState(): EngineState {
    return this.state;
  }

  getFactStore(): FactStore {
    return this.factStore;
  }

  getAgenda(): Agenda {
    return this.agenda;
  }

  getTraceCollector(): TraceCollector {
    return this.traceCollector;
  }

  getStats(): EngineStats {
    return {
      name: this.config.name,
      state: this.state,
      strategy: this.config.strategy,
      maxCycles: this.config.maxCycles,
      ...this.internals
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // CYCLE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Opakuje Match → kontrola ukončení → Resolve → Act.
   * Vrací důvod ukončení.
   */
  private runCycles(source: KnowledgeSource, progress: QueryProgress): string {
    for (;;) {
      const cycle = progress.cyclesExecuted + 1;
      this.traceCollector.setCycle(cycle);

      const factsBefore = this.factStore.size;
      const activationsCreated = this.match(source);

      if (this.agenda.isEmpty()) {
        return TERMINATION_AGENDA_EMPTY;
      }
      if (progress.cyclesExecuted >= this.config.maxCycles) {
        return TERMINATION_CYCLE_LIMIT;
      }

      progress.cyclesExecuted = cycle;
      const agendaSize = this.agenda.size;
      const activation = this.agenda.selectNext();
      if (activation === undefined) {
        return TERMINATION_AGENDA_EMPTY;
      }

      this.traceCollector.record('conflict_resolved', {
        activationId: activation.id,
        strategy: this.config.strategy,
        candidates: agendaSize
      }, activation.ruleId);

      const fired = this.act(source, activation);
      if (fired.ruleFired) {
        progress.rulesFired++;
      }
      progress.factsDerived += fired.factsCreated.length;

      const entry: CycleTrace = {
        cycle,
        factsBefore,
        factsAfter: this.factStore.size,
        agendaSize,
        activationsCreated,
        ruleFired: fired.ruleFired ? activation.ruleId : null,
        factsCreated: fired.factsCreated
      };
      progress.cycles.push(entry);
      this.traceCollector.record('cycle_completed', { ...entry });
    }
  }

  /**
   * Vyhodnotí všechna aktivní pravidla s čerstvými vazbami a splněné
   * vloží do agendy. Vrací počet nových aktivací.
   */
  private match(source: KnowledgeSource): number {
    let created = 0;

    for (const rule of source.listRules()) {
      if (!rule.active) continue;

      try {
        if (this.matchRule(rule)) created++;
      } catch (error) {
        const message = errorMessage(error);
        this.logger.warn(`Rule "${rule.id}" skipped during match: ${message}`);
        this.traceCollector.record('rule_skipped', { error: message }, rule.id);
      }
    }

    return created;
  }

  private matchRule(rule: Rule): boolean {
    const match = this.conditionEvaluator.evaluateAll(rule, new Bindings());
    if (!match.matched) {
      return false;
    }

    const bindings = match.bindings.toRecord();
    this.traceCollector.record('rule_matched', {
      bindings,
      triggeringFactIds: match.triggeringFactIds
    }, rule.id);

    const result = this.agenda.activate({
      ruleId: rule.id,
      bindings,
      triggeringFactIds: match.triggeringFactIds,
      specificity: rule.specificity,
      complexity: rule.complexity,
      priority: rule.priority,
      justification: `All ${rule.conditions.length} conditions of "${rule.name}" are satisfied`
    });

    if (result.status === 'duplicate') {
      this.traceCollector.record('activation_duplicate', { existingId: result.existingId }, rule.id);
      return false;
    }

    this.traceCollector.record('rule_activated', {
      activationId: result.activation.id,
      createdSeq: result.activation.createdSeq
    }, rule.id);
    return true;
  }

  /**
   * Provede akce vybrané aktivace. Aktivace se označí jako provedená
   * i tehdy, když její pravidlo mezitím zmizelo ze zdroje.
   */
  private act(
    source: KnowledgeSource,
    activation: Activation
  ): { ruleFired: boolean; factsCreated: string[] } {
    const factsCreated: string[] = [];
    const rule = source.getRule(activation.ruleId);

    if (!rule) {
      this.logger.warn(`Rule "${activation.ruleId}" of activation ${activation.id} not found, skipping`);
      this.traceCollector.record('rule_missing', { activationId: activation.id }, activation.ruleId);
      this.agenda.markExecuted(activation);
      return { ruleFired: false, factsCreated };
    }

    const bindings = new Bindings(activation.bindings);
    for (let i = 0; i < rule.actions.length; i++) {
      const action = rule.actions[i];
      if (action === undefined) continue;

      const outcome = this.actionExecutor.execute(action, bindings, rule.id, i);
      if (outcome.status === 'created') {
        factsCreated.push(outcome.factId);
      }
    }

    this.agenda.markExecuted(activation);
    this.logger.debug(`Fired ${rule.id} (${activation.id}), created ${factsCreated.length} facts`);
    return { ruleFired: true, factsCreated };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // RESULT
  // ═══════════════════════════════════════════════════════════════════════════

  private resetQueryState(): void {
    this.factStore.reset();
    this.agenda.reset();
    this.traceCollector.reset();
    this.conditionEvaluator.reset();
    this.actionExecutor.reset();
  }

  private buildResult(
    state: QueryResult['state'],
    terminationReason: string,
    progress: QueryProgress,
    elapsedMillis: number
  ): QueryResult {
    const summary = this.factStore.summary();

    return {
      success: state === 'completed',
      state,
      strategy: this.config.strategy,
      cyclesExecuted: progress.cyclesExecuted,
      rulesFired: progress.rulesFired,
      factsDerived: progress.factsDerived,
      conclusions: toConclusions(this.factStore.factsOfKind('conclusion')),
      derivedFacts: toConclusions(this.factStore.factsOfKind('derived')),
      terminationReason,
      elapsedMillis,
      fullTrace: {
        facts: {
          total: summary.total,
          byKind: summary.byKind,
          history: this.factStore.getHistory()
        },
        agenda: {
          decisions: this.agenda.decisions(),
          fired: this.agenda.history().map(activation => ({ ...activation }))
        },
        cycles: progress.cycles,
        conditions: this.conditionEvaluator.getTrace(),
        actions: this.actionExecutor.getTrace(),
        events: this.traceCollector.getAll()
      }
    };
  }
}

function toConclusions(facts: readonly Fact[]): Conclusion[] {
  const result: Conclusion[] = [];
  for (const fact of facts) {
    if (fact.kind === 'initial') continue;
    result.push({
      factId: fact.id,
      predicate: fact.predicate,
      value: fact.value,
      confidence: fact.confidence,
      justification: fact.justification,
      originRule: fact.originRule
    });
  }
  return result;
}
