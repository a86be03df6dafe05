import { describe, it, expect } from 'vitest';
import { fact } from '../../../src/dsl/condition/fact-expr.js';
import { v } from '../../../src/dsl/helpers/ref.js';

describe('fact()', () => {
  it.each([
    ['eq', fact('x').eq(1)],
    ['neq', fact('x').neq(1)],
    ['gt', fact('x').gt(1)],
    ['gte', fact('x').gte(1)],
    ['lt', fact('x').lt(1)],
    ['lte', fact('x').lte(1)],
    ['contains', fact('x').contains(1)]
  ])('builds %s', (operator, expr) => {
    expect(expr.build()).toEqual({ predicate: 'x', operator, value: 1 });
  });

  it('builds membership operators', () => {
    expect(fact('light').in(['low', 'medium']).build()).toEqual({ predicate: 'light', operator: 'in', value: ['low', 'medium'] });
    expect(fact('light').notIn(['high']).build()).toEqual({ predicate: 'light', operator: 'not_in', value: ['high'] });
  });

  it('takes the source of a RegExp', () => {
    expect(fact('purpose').matches(/^deco/).build()).toEqual({ predicate: 'purpose', operator: 'matches', value: '^deco' });
  });

  it('omits the value for existence tests', () => {
    expect(fact('pets_present').exists().build()).toEqual({ predicate: 'pets_present', operator: 'exists' });
    expect(fact('pets_present').notExists().build()).toEqual({ predicate: 'pets_present', operator: 'not_exists' });
  });

  it('adds binding, weight and explanation', () => {
    expect(fact('t').gte(18).as('temp').weight(2).because('Warm enough').build()).toEqual({
      predicate: 't',
      operator: 'gte',
      value: 18,
      bind: 'temp',
      weight: 2,
      explanation: 'Warm enough'
    });
  });

  it('keeps variable references and escapes marker literals', () => {
    expect(fact('a').eq(v('b')).build().value).toEqual({ var: 'b' });
    expect(fact('price').eq('$5').build().value).toBe('$$5');
  });

  it('rejects invalid use', () => {
    expect(() => fact('')).toThrow('fact() predicate must be a non-empty string');
    expect(() => fact('x').build()).toThrow('Condition on fact("x") has no operator. Call .eq(), .gte(), .exists(), etc.');
    expect(() => fact('x').eq(1).gt(2)).toThrow('Condition on fact("x") already uses operator "eq"');
    expect(() => fact('x').eq(1).as('1bad')).toThrow('as() name must be a valid variable name, got "1bad"');
    expect(() => fact('x').eq(1).weight(0)).toThrow('weight() must be a positive number');
  });
});
