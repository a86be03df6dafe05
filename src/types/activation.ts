import type { FactValue } from './fact.js';

/** Instance pravidla čekající v agendě */
export interface Activation {
  readonly id: string;                  // "A0001"
  readonly ruleId: string;
  readonly bindings: Readonly<Record<string, FactValue>>;
  readonly triggeringFactIds: readonly string[];
  readonly specificity: number;
  readonly complexity: number;
  readonly priority: number;
  readonly createdSeq: number;
  readonly justification: string;
  executed: boolean;
}

/** Strategie řešení konfliktů */
export type ConflictStrategy =
  | 'specificity'
  | 'recency'
  | 'complexity'
  | 'priority'
  | 'definition_order';

/** Vstup pro aktivaci pravidla */
export interface ActivationInput {
  ruleId: string;
  bindings: Readonly<Record<string, FactValue>>;
  triggeringFactIds: readonly string[];
  specificity: number;
  complexity: number;
  priority: number;
  justification: string;
}

/** Výsledek Agenda.activate() */
export type ActivationResult =
  | { status: 'activated'; activation: Activation }
  | { status: 'duplicate'; existingId: string };

/** Kandidát v rozhodnutí o konfliktu */
export interface ConflictCandidate {
  activationId: string;
  ruleId: string;
  specificity: number;
  complexity: number;
  priority: number;
  createdSeq: number;
}

/** Zaznamenané rozhodnutí řešení konfliktů */
export interface ConflictDecision {
  sequence: number;
  strategy: ConflictStrategy;
  candidates: ConflictCandidate[];
  winner: ConflictCandidate;
  reason: string;
}
