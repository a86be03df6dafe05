import type { Operand } from './condition.js';

/** Typy akcí (část ENTONCES / THEN) */
export type RuleActionType =
  | 'assert'
  | 'retract'
  | 'conclude'
  | 'recommend'
  | 'set'
  | 'increment';

/** Akce pravidla */
export interface RuleAction {
  type: RuleActionType;
  predicate: string;
  value?: Operand;
  confidence: number;     // 0..1
  explanation: string;
}

/** Akce tak, jak ji zapisuje autor pravidel */
export interface RuleActionInput {
  type: RuleActionType;
  predicate: string;
  value?: unknown;
  confidence?: number;
  explanation?: string;
}

/** Výsledek provedení akce */
export type ActionOutcome =
  | { status: 'created'; factId: string }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string };
