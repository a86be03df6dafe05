import type { FactHistoryEntry, FactKind, FactValue } from './fact.js';
import type { Activation, ConflictDecision, ConflictStrategy } from './activation.js';
import type { ActionTrace, ConditionTrace, CycleTrace, TraceEntry } from '../debugging/types.js';

/** Stav inferenčního enginu */
export type EngineState = 'idle' | 'running' | 'completed' | 'aborted';

/** Závěr vrácený volajícímu */
export interface Conclusion {
  factId: string;
  predicate: string;
  value: FactValue;
  confidence: number;
  justification: string;
  originRule: string;
}

/** Kompletní trace jednoho dotazu */
export interface ExplanationTrace {
  facts: {
    total: number;
    byKind: Record<FactKind, number>;
    history: FactHistoryEntry[];
  };
  agenda: {
    decisions: ConflictDecision[];
    fired: Activation[];
  };
  cycles: CycleTrace[];
  conditions: ConditionTrace[];
  actions: ActionTrace[];
  events: TraceEntry[];
}

/** Výsledek runQuery() */
export interface QueryResult {
  success: boolean;
  state: Extract<EngineState, 'completed' | 'aborted'>;
  strategy: ConflictStrategy;
  cyclesExecuted: number;
  rulesFired: number;
  factsDerived: number;
  conclusions: Conclusion[];
  derivedFacts: Conclusion[];
  terminationReason: string;
  elapsedMillis: number;
  fullTrace: ExplanationTrace;
}

/** Vstup dotazu - predikát → počáteční hodnota */
export type QueryInput = Readonly<Record<string, FactValue>>;
