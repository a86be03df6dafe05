import { describe, it, expect } from 'vitest';
import {
  CONFLICT_STRATEGIES,
  DEFAULT_STRATEGY,
  describeDecision,
  getComparator,
  isConflictStrategy
} from '../../../src/core/strategies.js';
import type { Activation } from '../../../src/types/activation.js';

function activation(id: string, overrides: Partial<Activation> = {}): Activation {
  return {
    id,
    ruleId: `rule-${id}`,
    bindings: {},
    triggeringFactIds: [],
    specificity: 1,
    complexity: 1,
    priority: 0,
    createdSeq: 1,
    justification: '',
    executed: false,
    ...overrides
  };
}

describe('strategies', () => {
  it('defaults to specificity', () => {
    expect(DEFAULT_STRATEGY).toBe('specificity');
    expect(CONFLICT_STRATEGIES).toEqual(['specificity', 'recency', 'complexity', 'priority', 'definition_order']);
  });

  it('recognizes strategy names', () => {
    expect(isConflictStrategy('priority')).toBe(true);
    expect(isConflictStrategy('random')).toBe(false);
    expect(isConflictStrategy(3)).toBe(false);
  });

  it('orders higher metric first and ties by createdSeq', () => {
    const compare = getComparator('priority');
    const low = activation('A1', { priority: 1, createdSeq: 1 });
    const high = activation('A2', { priority: 5, createdSeq: 2 });
    const tie = activation('A3', { priority: 5, createdSeq: 3 });

    expect([low, tie, high].sort(compare).map(a => a.id)).toEqual(['A2', 'A3', 'A1']);
  });

  it('orders recency newest first', () => {
    const compare = getComparator('recency');
    const items = [1, 3, 2].map(seq => activation(`A${seq}`, { createdSeq: seq }));

    expect(items.sort(compare).map(a => a.createdSeq)).toEqual([3, 2, 1]);
  });

  it('orders definition_order oldest first', () => {
    const compare = getComparator('definition_order');
    const items = [3, 1, 2].map(seq => activation(`A${seq}`, { createdSeq: seq }));

    expect(items.sort(compare).map(a => a.createdSeq)).toEqual([1, 2, 3]);
  });

  it('describes decisions', () => {
    const winner = activation('A1', { ruleId: 'R7', complexity: 4, createdSeq: 2 });

    expect(describeDecision('complexity', winner, 3)).toBe('Rule R7 has the highest complexity (4), among 3 candidates');
    expect(describeDecision('recency', winner, 1)).toBe('Rule R7 is the most recent activation (seq 2), only candidate');
    expect(describeDecision('definition_order', winner, 2)).toBe('Rule R7 was activated first (seq 2), among 2 candidates');
  });
});
