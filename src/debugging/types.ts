/**
 * Tracing types for the inference cycle.
 */

import type { ConditionOperator } from '../types/condition.js';
import type { RuleActionType } from '../types/action.js';
import type { FactValue } from '../types/fact.js';

/** Types of trace entries that can be recorded */
export type TraceEntryType =
  | 'query_started'
  | 'condition_evaluated'
  | 'rule_matched'
  | 'rule_skipped'
  | 'rule_activated'
  | 'activation_duplicate'
  | 'conflict_resolved'
  | 'rule_missing'
  | 'action_executed'
  | 'cycle_completed'
  | 'query_finished'
  | 'engine_error';

/** A single trace entry recording an engine activity */
export interface TraceEntry {
  /** Sequential identifier within one query ("T0001") */
  id: string;

  /** Position of the entry in the query's trace */
  sequence: number;

  /** Type of activity being traced */
  type: TraceEntryType;

  /** Cycle whose Match or Act phase produced the entry (0 before the loop starts) */
  cycle: number;

  /** ID of the rule involved, if applicable */
  ruleId?: string;

  /** Additional contextual information about the activity */
  details: Record<string, unknown>;
}

/** Filter options for querying trace entries */
export interface TraceFilter {
  ruleId?: string;
  types?: TraceEntryType[];
  cycle?: number;
  limit?: number;
}

/** Callback type for trace entry subscriptions */
export type TraceSubscriber = (entry: TraceEntry) => void;

/** Detailed information about a single condition evaluation */
export interface ConditionTrace {
  /** ID of the rule that owns the condition, when evaluated during Match */
  ruleId?: string;

  /** Index of the condition in the rule's conditions array */
  conditionIndex: number;

  predicate: string;

  operator: ConditionOperator;

  /** The expected value (resolved from a literal or a bound variable) */
  expectedValue: FactValue | undefined;

  /** The value of the fact found for the predicate */
  actualValue: FactValue | undefined;

  /** Whether the condition passed */
  result: boolean;

  /** Why the condition failed, when it did */
  reason?: string;

  /** Internal error message, when evaluation failed */
  error?: string;
}

/** Information about one executed action */
export interface ActionTrace {
  ruleId: string;

  /** Index of the action in the rule's actions array */
  actionIndex: number;

  actionType: RuleActionType;

  predicate: string;

  /** Value after resolving bound variables */
  resolvedValue: FactValue | undefined;

  status: 'created' | 'skipped' | 'failed';

  factId?: string;

  reason?: string;

  error?: string;
}

/** One Match/Resolve/Act cycle */
export interface CycleTrace {
  cycle: number;
  factsBefore: number;
  factsAfter: number;
  agendaSize: number;
  activationsCreated: number;
  ruleFired: string | null;
  factsCreated: string[];
}
