import { describe, it, expect } from 'vitest';
import { createRule } from '../../../src/core/rule-factory.js';
import { RuleValidationError } from '../../../src/validation/rule-validation-error.js';

describe('createRule', () => {
  it('fills defaults and derives specificity and complexity', () => {
    const rule = createRule({
      id: 'R1',
      conditions: [
        { predicate: 'location', operator: 'eq', value: 'indoor' },
        { predicate: 'heating_level', operator: 'gte', value: 3 }
      ],
      actions: [{ type: 'assert', predicate: 'dry_environment', value: true }]
    });

    expect(rule).toMatchObject({
      id: 'R1',
      name: 'R1',
      description: '',
      domain: 'general',
      source: '',
      tags: [],
      priority: 0,
      specificity: 2,
      complexity: 3,
      active: true
    });
    expect(rule.conditions[0]).toEqual({ predicate: 'location', operator: 'eq', value: 'indoor', weight: 1, explanation: '' });
    expect(rule.actions[0]).toEqual({ type: 'assert', predicate: 'dry_environment', value: true, confidence: 1, explanation: '' });
  });

  it('keeps explicit metrics', () => {
    const rule = createRule({
      id: 'R1',
      priority: 7,
      specificity: 9,
      complexity: 1,
      conditions: [{ predicate: 'a', operator: 'exists' }],
      actions: [{ type: 'assert', predicate: 'b' }]
    });

    expect([rule.priority, rule.specificity, rule.complexity]).toEqual([7, 9, 1]);
  });

  it('normalizes variable operands', () => {
    const rule = createRule({
      id: 'R1',
      conditions: [
        { predicate: 'heating_level', operator: 'gte', value: 3, bind: 'level' },
        { predicate: 'price', operator: 'eq', value: '$$5' }
      ],
      actions: [{ type: 'assert', predicate: 'copy', value: '$level' }]
    });

    expect(rule.conditions[0]?.bind).toBe('level');
    expect(rule.conditions[1]?.value).toBe('$5');
    expect(rule.actions[0]?.value).toEqual({ var: 'level' });
  });

  it('stores null for existence tests and omits missing action values', () => {
    const rule = createRule({
      id: 'R1',
      conditions: [{ predicate: 'a', operator: 'exists' }],
      actions: [{ type: 'retract', predicate: 'a' }]
    });

    expect(rule.conditions[0]?.value).toBeNull();
    expect('value' in (rule.actions[0] ?? {})).toBe(false);
  });

  it('freezes the rule deeply', () => {
    const rule = createRule({
      id: 'R1',
      tags: ['indoor'],
      conditions: [{ predicate: 'a', operator: 'in', value: ['x', 'y'] }],
      actions: [{ type: 'assert', predicate: 'b', value: true }]
    });

    expect(Object.isFrozen(rule)).toBe(true);
    expect(Object.isFrozen(rule.tags)).toBe(true);
    expect(Object.isFrozen(rule.conditions[0])).toBe(true);
    expect(Object.isFrozen(rule.conditions[0]?.value)).toBe(true);
  });

  it('throws RuleValidationError for invalid input', () => {
    expect(() => createRule({ id: 'R1', conditions: [], actions: [] }))
      .toThrow(new RuleValidationError(
        'Rule "R1" is invalid: conditions: Rule must have at least one condition (+1 more)',
        []
      ));
  });
});
