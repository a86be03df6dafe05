import type {
  Fact,
  FactHistoryEntry,
  FactKind,
  FactSummary,
  FactValue,
  InferredFact,
  InitialFact
} from '../types/fact.js';
import { SequentialIdGenerator } from '../utils/id-generator.js';
import { deepFreeze, valuesEqual } from '../utils/values.js';
import { errorMessage, type Logger } from '../utils/logger.js';

/**
 * Callback pro notifikace o nových faktech.
 */
export type FactAssertedListener = (fact: Fact) => void;

export interface FactStoreConfig {
  name?: string;
  onFactAsserted?: FactAssertedListener;
  logger?: Logger;
}

const FACT_KINDS: readonly FactKind[] = ['initial', 'derived', 'conclusion'];

/**
 * Pracovní paměť jednoho dotazu.
 *
 * Každý assert vytvoří nový neměnný fakt s novým ID - nic se nepřepisuje.
 * Pozdější fakt pro stejný predikát zastíní starší při vyhledávání,
 * starší zůstává v historii.
 */
export class FactStore {
  private readonly facts: Map<string, Fact> = new Map();
  private readonly history: FactHistoryEntry[] = [];
  private readonly ids = new SequentialIdGenerator('F');
  private readonly name: string;
  private readonly listener: FactAssertedListener | undefined;
  private readonly logger: Logger;
  private sequence = 0;

  /**
   * Index podle predikátu - ID faktů v pořadí vložení.
   * Poslední prvek je vždy nejnovější fakt.
   */
  private readonly byPredicate: Map<string, string[]> = new Map();

  /** Index podle druhu faktu */
  private readonly byKind: Map<FactKind, string[]> = new Map(
    FACT_KINDS.map((kind): [FactKind, string[]] => [kind, []])
  );

  constructor(config: FactStoreConfig = {}) {
    this.name = config.name ?? 'facts';
    this.listener = config.onFactAsserted;
    this.logger = config.logger ?? console;
  }

  /**
   * Vloží vstupní fakt od uživatele.
   */
  assertInitial(predicate: string, value: FactValue, justification = 'User input'): string {
    return this.insert({
      kind: 'initial',
      id: this.ids.next(),
      predicate,
      value,
      confidence: 1,
      justification,
      ...this.stamp()
    });
  }

  /**
   * Vloží fakt odvozený pravidlem.
   */
  assertDerived(
    predicate: string,
    value: FactValue,
    originRule: string,
    justification: string,
    confidence = 1
  ): string {
    return this.insertInferred('derived', predicate, value, originRule, justification, confidence);
  }

  /**
   * Vloží závěr - jediné fakty vracené volajícímu jako výsledek.
   */
  assertConclusion(
    predicate: string,
    value: FactValue,
    originRule: string,
    justification: string,
    confidence = 1
  ): string {
    return this.insertInferred('conclusion', predicate, value, originRule, justification, confidence);
  }

  /**
   * Vrátí nejnovější fakt pro predikát.
   */
  lookup(predicate: string): Fact | undefined {
    const ids = this.byPredicate.get(predicate);
    const latest = ids?.[ids.length - 1];
    return latest === undefined ? undefined : this.facts.get(latest);
  }

  /**
   * Existuje fakt pro predikát (volitelně s danou hodnotou)?
   * Hodnota se porovnává s nejnovějším faktem.
   */
  exists(predicate: string, value?: FactValue): boolean {
    const fact = this.lookup(predicate);
    if (!fact) return false;
    return value === undefined || valuesEqual(fact.value, value);
  }

  get(id: string): Fact | undefined {
    return this.facts.get(id);
  }

  /**
   * Všechny fakty v pořadí vložení.
   */
  allFacts(): Fact[] {
    return [...this.facts.values()];
  }

  factsOfKind(kind: FactKind): Fact[] {
    return this.resolve(this.byKind.get(kind) ?? []);
  }

  /**
   * Všechny fakty pro predikát, od nejstaršího.
   */
  factsFor(predicate: string): Fact[] {
    return this.resolve(this.byPredicate.get(predicate) ?? []);
  }

  /**
   * Append-only historie assertů pro vysvětlení.
   */
  getHistory(): FactHistoryEntry[] {
    return [...this.history];
  }

  summary(): FactSummary {
    return {
      total: this.facts.size,
      byKind: {
        initial: this.byKind.get('initial')?.length ?? 0,
        derived: this.byKind.get('derived')?.length ?? 0,
        conclusion: this.byKind.get('conclusion')?.length ?? 0
      }
    };
  }

  /**
   * Počet faktů.
   */
  get size(): number {
    return this.facts.size;
  }

  /**
   * Vymaže všechny fakty, indexy, historii i čítače.
   */
  reset(): void {
    this.facts.clear();
    this.byPredicate.clear();
    for (const kind of FACT_KINDS) {
      this.byKind.set(kind, []);
    }
    this.history.length = 0;
    this.ids.reset();
    this.sequence = 0;
  }

  private insertInferred(
    kind: InferredFact['kind'],
    predicate: string,
    value: FactValue,
    originRule: string,
    justification: string,
    confidence: number
  ): string {
    if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
      throw new RangeError(`Confidence must be within [0, 1], got ${confidence}`);
    }

    return this.insert({
      kind,
      id: this.ids.next(),
      predicate,
      value,
      originRule,
      confidence,
      justification,
      ...this.stamp()
    });
  }

  private insert(fact: InitialFact | InferredFact): string {
    // Kopie odpojí fakt od vstupu volajícího
    fact.value = structuredClone(fact.value);
    deepFreeze(fact);
    this.facts.set(fact.id, fact);

    let ids = this.byPredicate.get(fact.predicate);
    if (!ids) {
      ids = [];
      this.byPredicate.set(fact.predicate, ids);
    }
    ids.push(fact.id);
    this.byKind.get(fact.kind)?.push(fact.id);

    this.history.push({
      sequence: fact.timestamp,
      factId: fact.id,
      kind: fact.kind,
      predicate: fact.predicate,
      value: fact.value,
      ...(fact.originRule !== undefined && { originRule: fact.originRule }),
      confidence: fact.confidence,
      justification: fact.justification
    });

    this.notify(fact);
    return fact.id;
  }

  private stamp(): { timestamp: number; assertedAt: number } {
    this.sequence++;
    return { timestamp: this.sequence, assertedAt: Date.now() };
  }

  private resolve(ids: readonly string[]): Fact[] {
    const result: Fact[] = [];
    for (const id of ids) {
      const fact = this.facts.get(id);
      if (fact) result.push(fact);
    }
    return result;
  }

  /**
   * Notifikuje listener o novém faktu.
   */
  private notify(fact: Fact): void {
    if (this.listener) {
      try {
        this.listener(fact);
      } catch (error) {
        this.logger.error(`Error in fact listener of "${this.name}": ${errorMessage(error)}`);
      }
    }
  }
}
