import { describe, it, expect } from 'vitest';
import { Rule } from '../../../src/dsl/builder/rule-builder.js';
import { fact } from '../../../src/dsl/condition/fact-expr.js';
import { assertFact, recommend } from '../../../src/dsl/action/fact-actions.js';
import { v } from '../../../src/dsl/helpers/ref.js';
import { DslValidationError } from '../../../src/dsl/helpers/errors.js';
import { createRule } from '../../../src/core/rule-factory.js';

describe('RuleBuilder', () => {
  it('builds a minimal rule with defaults', () => {
    const rule = Rule.create('R1')
      .if(fact('location').eq('indoor'))
      .then(assertFact('indoor_plant', true))
      .build();

    expect(rule).toEqual({
      id: 'R1',
      name: 'R1',
      priority: 0,
      active: true,
      tags: [],
      conditions: [{ predicate: 'location', operator: 'eq', value: 'indoor' }],
      actions: [{ type: 'assert', predicate: 'indoor_plant', value: true }]
    });
  });

  it('carries every optional field', () => {
    const rule = Rule.create('R011')
      .name('Sunny garden')
      .description('Outdoor rule')
      .domain('final_recommendation')
      .source('Local nursery')
      .priority(9)
      .specificity(4)
      .complexity(5)
      .active(false)
      .tags('outdoor', 'beginner')
      .if(fact('location').eq('outdoor'))
      .and(fact('light').eq('high').as('sun'))
      .then(recommend('ideal_plant', 'Black shrub').confidence(0.97))
      .also(assertFact('light_seen', v('sun')))
      .build();

    expect(rule).toMatchObject({
      name: 'Sunny garden',
      description: 'Outdoor rule',
      domain: 'final_recommendation',
      source: 'Local nursery',
      priority: 9,
      specificity: 4,
      complexity: 5,
      active: false,
      tags: ['outdoor', 'beginner']
    });
    expect(rule.conditions[1]).toEqual({ predicate: 'light', operator: 'eq', value: 'high', bind: 'sun' });
    expect(rule.actions).toEqual([
      { type: 'recommend', predicate: 'ideal_plant', value: 'Black shrub', confidence: 0.97 },
      { type: 'assert', predicate: 'light_seen', value: { var: 'sun' } }
    ]);
  });

  it('accepts raw condition and action inputs', () => {
    const rule = Rule.create('R1')
      .if({ predicate: 'a', operator: 'exists' })
      .then({ type: 'assert', predicate: 'b', value: 1 })
      .build();

    expect(rule.conditions).toEqual([{ predicate: 'a', operator: 'exists' }]);
  });

  it('produces input the rule factory accepts', () => {
    const input = Rule.create('R1')
      .if(fact('heating_level').gte(3).as('level'))
      .then(assertFact('copy', v('level')))
      .build();

    expect(createRule(input).actions[0]?.value).toEqual({ var: 'level' });
  });

  it('rejects an empty id', () => {
    expect(() => Rule.create('')).toThrow(DslValidationError);
  });

  it('requires conditions and actions', () => {
    expect(() => Rule.create('R1').then(assertFact('x', 1)).build())
      .toThrow('Rule "R1": at least one condition is required. Use .if()');
    expect(() => Rule.create('R1').if(fact('x').exists()).build())
      .toThrow('Rule "R1": at least one action is required. Use .then()');
  });

  it('validates numeric settings', () => {
    expect(() => Rule.create('R1').priority(Number.NaN)).toThrow('Priority must be a finite number');
    expect(() => Rule.create('R1').specificity(1.5)).toThrow('Specificity must be a non-negative integer');
    expect(() => Rule.create('R1').complexity(-1)).toThrow('Complexity must be a non-negative integer');
    expect(() => Rule.create('R1').domain('')).toThrow('domain() must be a non-empty string');
  });
});
