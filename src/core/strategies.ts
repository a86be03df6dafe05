import type { Activation, ConflictStrategy } from '../types/activation.js';

/**
 * Porovnání dvou aktivací. Záporný výsledek = `a` vyhrává.
 */
export type ActivationComparator = (a: Activation, b: Activation) => number;

/** Podporované strategie v pořadí, v jakém se nabízejí uživateli */
export const CONFLICT_STRATEGIES = [
  'specificity',
  'recency',
  'complexity',
  'priority',
  'definition_order'
] as const satisfies readonly ConflictStrategy[];

export const DEFAULT_STRATEGY: ConflictStrategy = 'specificity';

const byCreatedSeq: ActivationComparator = (a, b) => a.createdSeq - b.createdSeq;

/**
 * Větší metrika vyhrává, remízu rozhoduje dřívější createdSeq.
 */
function descending(metric: (activation: Activation) => number): ActivationComparator {
  return (a, b) => metric(b) - metric(a) || byCreatedSeq(a, b);
}

const COMPARATORS: Record<ConflictStrategy, ActivationComparator> = {
  specificity: descending(a => a.specificity),
  recency: (a, b) => b.createdSeq - a.createdSeq,
  complexity: descending(a => a.complexity),
  priority: descending(a => a.priority),
  definition_order: byCreatedSeq
};

export function getComparator(strategy: ConflictStrategy): ActivationComparator {
  return COMPARATORS[strategy];
}

export function isConflictStrategy(value: unknown): value is ConflictStrategy {
  return typeof value === 'string' && CONFLICT_STRATEGIES.some(strategy => strategy === value);
}

/**
 * Lidsky čitelné zdůvodnění výběru vítěze.
 */
export function describeDecision(strategy: ConflictStrategy, winner: Activation, candidates: number): string {
  const among = candidates === 1 ? 'only candidate' : `among ${candidates} candidates`;

  switch (strategy) {
    case 'specificity':
      return `Rule ${winner.ruleId} has the highest specificity (${winner.specificity}), ${among}`;
    case 'recency':
      return `Rule ${winner.ruleId} is the most recent activation (seq ${winner.createdSeq}), ${among}`;
    case 'complexity':
      return `Rule ${winner.ruleId} has the highest complexity (${winner.complexity}), ${among}`;
    case 'priority':
      return `Rule ${winner.ruleId} has the highest priority (${winner.priority}), ${among}`;
    case 'definition_order':
      return `Rule ${winner.ruleId} was activated first (seq ${winner.createdSeq}), ${among}`;
    default: {
      const unreachable: never = strategy;
      return `Unknown strategy: ${String(unreachable)}`;
    }
  }
}
