import { describe, it, expect, beforeEach } from 'vitest';
import { KnowledgeBase } from '../../../src/core/knowledge-base.js';
import { DuplicateRuleError } from '../../../src/core/errors.js';
import type { RuleInput } from '../../../src/types/rule.js';

function rule(id: string, overrides: Partial<RuleInput> = {}): RuleInput {
  return {
    id,
    conditions: [{ predicate: 'location', operator: 'eq', value: 'indoor' }],
    actions: [{ type: 'assert', predicate: 'indoor_plant', value: true }],
    ...overrides
  };
}

describe('KnowledgeBase', () => {
  let kb: KnowledgeBase;

  beforeEach(() => {
    kb = KnowledgeBase.from([
      rule('R1', { domain: 'environment', tags: ['indoor'] }),
      rule('R2', { domain: 'final_recommendation', tags: ['indoor', 'beginner'] }),
      rule('R3', { domain: 'environment' })
    ]);
  });

  it('lists rules in registration order', () => {
    expect(kb.listRules().map(r => r.id)).toEqual(['R1', 'R2', 'R3']);
    expect(kb.size).toBe(3);
  });

  it('rejects a duplicate id', () => {
    expect(() => kb.register(rule('R1'))).toThrow(DuplicateRuleError);
    expect(() => kb.register(rule('R1'))).toThrow('Rule "R1" is already registered');
  });

  it('indexes by domain and tag', () => {
    expect(kb.getByDomain('environment').map(r => r.id)).toEqual(['R1', 'R3']);
    expect(kb.getByTag('indoor').map(r => r.id)).toEqual(['R1', 'R2']);
    expect(kb.getByTag('missing')).toEqual([]);
    expect(kb.domains()).toEqual(['environment', 'final_recommendation']);
  });

  it('unregisters rules and their index entries', () => {
    expect(kb.unregister('R2')).toBe(true);
    expect(kb.unregister('R2')).toBe(false);

    expect(kb.getRule('R2')).toBeUndefined();
    expect(kb.domains()).toEqual(['environment']);
    expect(kb.getByTag('beginner')).toEqual([]);
  });

  it('toggles rules without changing order', () => {
    expect(kb.disable('R1')).toBe(true);
    expect(kb.getRule('R1')?.active).toBe(false);
    expect(Object.isFrozen(kb.getRule('R1'))).toBe(true);
    expect(kb.listRules().map(r => r.id)).toEqual(['R1', 'R2', 'R3']);

    kb.enable('R1');
    expect(kb.getRule('R1')?.active).toBe(true);
    expect(kb.disable('R9')).toBe(false);
  });

  it('keeps earlier rules when a later one fails', () => {
    const partial = new KnowledgeBase();

    expect(() => partial.registerMany([rule('A'), rule('B', { conditions: [] })])).toThrow();
    expect(partial.listRules().map(r => r.id)).toEqual(['A']);
  });
});
