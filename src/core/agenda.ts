import type {
  Activation,
  ActivationInput,
  ActivationResult,
  ConflictCandidate,
  ConflictDecision,
  ConflictStrategy
} from '../types/activation.js';
import { Bindings } from '../evaluation/bindings.js';
import { SequentialIdGenerator } from '../utils/id-generator.js';
import { DEFAULT_STRATEGY, describeDecision, getComparator, type ActivationComparator } from './strategies.js';

/**
 * Konfliktní množina jednoho dotazu.
 *
 * Drží čekající aktivace a historii vystřelených. Dvojice
 * (ruleId, vazby) se do agendy dostane nejvýše jednou za dotaz -
 * duplicita se hlídá proti čekajícím i již provedeným aktivacím.
 */
export class Agenda {
  private readonly pendingList: Activation[] = [];
  private readonly fired: Activation[] = [];
  private readonly decisionLog: ConflictDecision[] = [];

  /** Klíč (ruleId + vazby) → ID aktivace */
  private readonly seen: Map<string, string> = new Map();

  private readonly ids = new SequentialIdGenerator('A');
  private readonly comparator: ActivationComparator;
  private sequence = 0;

  constructor(readonly strategy: ConflictStrategy = DEFAULT_STRATEGY) {
    this.comparator = getComparator(strategy);
  }

  /**
   * Vloží novou aktivaci, pokud stejná instance pravidla ještě neexistuje.
   */
  activate(input: ActivationInput): ActivationResult {
    const key = activationKey(input.ruleId, input.bindings);
    const existingId = this.seen.get(key);
    if (existingId !== undefined) {
      return { status: 'duplicate', existingId };
    }

    this.sequence++;
    const activation: Activation = {
      id: this.ids.next(),
      ruleId: input.ruleId,
      bindings: Object.freeze({ ...input.bindings }),
      triggeringFactIds: Object.freeze([...input.triggeringFactIds]),
      specificity: input.specificity,
      complexity: input.complexity,
      priority: input.priority,
      createdSeq: this.sequence,
      justification: input.justification,
      executed: false
    };

    this.pendingList.push(activation);
    this.seen.set(key, activation.id);
    return { status: 'activated', activation };
  }

  /**
   * Vybere další aktivaci podle strategie. Aktivace zůstává v agendě,
   * dokud ji engine neoznačí jako provedenou.
   */
  selectNext(): Activation | undefined {
    if (this.pendingList.length === 0) {
      return undefined;
    }

    const ranked = [...this.pendingList].sort(this.comparator);
    const winner = ranked[0];
    if (winner === undefined) {
      return undefined;
    }

    this.decisionLog.push({
      sequence: this.decisionLog.length + 1,
      strategy: this.strategy,
      candidates: this.pendingList.map(toCandidate),
      winner: toCandidate(winner),
      reason: describeDecision(this.strategy, winner, this.pendingList.length)
    });

    return winner;
  }

  /**
   * Přesune aktivaci do historie. Neznámá nebo již provedená aktivace
   * je chyba volajícího.
   */
  markExecuted(activation: Activation): void {
    const index = this.pendingList.findIndex(a => a.id === activation.id);
    const pending = this.pendingList[index];
    if (pending === undefined) {
      throw new Error(`Activation ${activation.id} is not pending`);
    }

    this.pendingList.splice(index, 1);
    pending.executed = true;
    this.fired.push(pending);
  }

  isEmpty(): boolean {
    return this.pendingList.length === 0;
  }

  get size(): number {
    return this.pendingList.length;
  }

  /** Čekající aktivace v pořadí vložení */
  pending(): Activation[] {
    return [...this.pendingList];
  }

  /** Provedené aktivace v pořadí provedení */
  history(): Activation[] {
    return [...this.fired];
  }

  decisions(): ConflictDecision[] {
    return [...this.decisionLog];
  }

  reset(): void {
    this.pendingList.length = 0;
    this.fired.length = 0;
    this.decisionLog.length = 0;
    this.seen.clear();
    this.ids.reset();
    this.sequence = 0;
  }
}

function activationKey(ruleId: string, bindings: ActivationInput['bindings']): string {
  return `${ruleId}\u0000${Bindings.key(bindings)}`;
}

function toCandidate(activation: Activation): ConflictCandidate {
  return {
    activationId: activation.id,
    ruleId: activation.ruleId,
    specificity: activation.specificity,
    complexity: activation.complexity,
    priority: activation.priority,
    createdSeq: activation.createdSeq
  };
}
