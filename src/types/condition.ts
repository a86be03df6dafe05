import type { FactValue } from './fact.js';

/** Reference na proměnnou navázanou dřívější podmínkou */
export interface VariableRef {
  var: string;
}

/** Literál nebo reference na proměnnou */
export type Operand = FactValue | VariableRef;

/** Operátory podmínek */
export type ConditionOperator =
  | 'eq' | 'neq'                              // Rovnost
  | 'gt' | 'gte' | 'lt' | 'lte'              // Porovnání (numerické)
  | 'in' | 'not_in'                          // Členství v kolekci
  | 'contains'                               // Kolekce/řetězec obsahuje
  | 'matches'                                // Regex
  | 'exists' | 'not_exists';                 // Existence

/** Podmínka pravidla (část SI) */
export interface RuleCondition {
  predicate: string;
  operator: ConditionOperator;
  value: Operand;                 // Literál nebo { var }
  bind?: string;                  // Naváže hodnotu faktu na proměnnou
  weight: number;                 // > 0
  explanation: string;
}

/** Podmínka tak, jak ji zapisuje autor pravidel */
export interface RuleConditionInput {
  predicate: string;
  operator: ConditionOperator;
  value?: unknown;                // "$x" = proměnná, "$$x" = literál "$x"
  bind?: string;
  weight?: number;
  explanation?: string;
}
