import { describe, it, expect } from 'vitest';
import { RuleInputValidator } from '../../../src/validation/rule-validator.js';
import { RuleValidationError } from '../../../src/validation/rule-validation-error.js';

const validRule = {
  id: 'R1',
  conditions: [{ predicate: 'location', operator: 'eq', value: 'indoor' }],
  actions: [{ type: 'assert', predicate: 'dry_environment', value: true }]
};

describe('RuleInputValidator', () => {
  const validator = new RuleInputValidator();

  it('accepts a minimal rule', () => {
    expect(validator.validate(validRule)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('rejects a non object', () => {
    expect(validator.validate('R1').errors).toEqual([
      { path: '(root)', message: 'Rule must be an object', severity: 'error' }
    ]);
  });

  it('reports missing required fields', () => {
    const result = validator.validate({});

    expect(result.valid).toBe(false);
    expect(result.errors.map(e => e.message)).toEqual([
      'Required field "id" is missing',
      'Required field "conditions" is missing',
      'Required field "actions" is missing'
    ]);
  });

  it('rejects empty condition and action lists', () => {
    const result = validator.validate({ id: 'R1', conditions: [], actions: [] });

    expect(result.errors.map(e => `${e.path}: ${e.message}`)).toEqual([
      'conditions: Rule must have at least one condition',
      'actions: Rule must have at least one action'
    ]);
  });

  it('checks field types', () => {
    const result = validator.validate({ ...validRule, priority: 'high', specificity: -1, active: 'yes', tags: ['a', 2] });

    expect(result.errors.map(e => e.path)).toEqual(['priority', 'specificity', 'active', 'tags[1]']);
  });

  it('allows a negative priority', () => {
    expect(validator.validate({ ...validRule, priority: -5 }).valid).toBe(true);
  });

  it('reports an unknown operator', () => {
    const result = validator.validate({
      ...validRule,
      conditions: [{ predicate: 'location', operator: 'like', value: 'x' }]
    });

    expect(result.errors[0]?.path).toBe('conditions[0].operator');
    expect(result.errors[0]?.message.startsWith('Invalid operator: like.')).toBe(true);
  });

  it('requires a value except for existence tests', () => {
    const result = validator.validate({
      ...validRule,
      conditions: [
        { predicate: 'location', operator: 'eq' },
        { predicate: 'pets_present', operator: 'not_exists' }
      ]
    });

    expect(result.errors).toEqual([
      { path: 'conditions[0].value', message: 'Condition must have a "value" field', severity: 'error' }
    ]);
  });

  it('rejects an invalid regular expression', () => {
    const result = validator.validate({
      ...validRule,
      conditions: [{ predicate: 'purpose', operator: 'matches', value: '(' }]
    });

    expect(result.errors[0]?.message).toBe('Invalid regular expression: (');
  });

  it('rejects non positive weights and bad bind names', () => {
    const result = validator.validate({
      ...validRule,
      conditions: [{ predicate: 'light', operator: 'eq', value: 'low', weight: 0, bind: '1x' }]
    });

    expect(result.errors.map(e => e.path)).toEqual(['conditions[0].weight', 'conditions[0].bind']);
  });

  it('warns about variables referenced before they are bound', () => {
    const result = validator.validate({
      ...validRule,
      actions: [{ type: 'assert', predicate: 'copy', value: '$level' }]
    });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([{
      path: 'actions[0].value',
      message: 'Variable "$level" is referenced before any condition binds it',
      severity: 'warning'
    }]);
  });

  it('accepts a variable bound by an earlier condition', () => {
    const result = validator.validate({
      id: 'R1',
      conditions: [{ predicate: 'heating_level', operator: 'gte', value: 3, bind: 'level' }],
      actions: [{ type: 'assert', predicate: 'copy', value: '$level' }]
    });

    expect(result.warnings).toEqual([]);
  });

  it('validates action types, confidence and increment steps', () => {
    const result = validator.validate({
      ...validRule,
      actions: [
        { type: 'delete', predicate: 'x' },
        { type: 'assert', predicate: 'x', value: 1, confidence: 1.5 },
        { type: 'increment', predicate: 'score', value: 'two' }
      ]
    });

    expect(result.errors.map(e => e.path)).toEqual(['actions[0].type', 'actions[1].confidence', 'actions[2].value']);
  });

  it('warns when an asserting action has no value', () => {
    const result = validator.validate({ ...validRule, actions: [{ type: 'conclude', predicate: 'done' }] });

    expect(result.warnings.map(w => w.message)).toEqual(['conclude action has no "value"; true will be asserted']);
  });

  it('does not warn for retract or increment without a value', () => {
    const result = validator.validate({
      ...validRule,
      actions: [{ type: 'retract', predicate: 'x' }, { type: 'increment', predicate: 'score' }]
    });

    expect(result.warnings).toEqual([]);
  });

  it('reports unused bindings in strict mode', () => {
    const strict = new RuleInputValidator({ strict: true });

    const result = strict.validate({
      id: 'R1',
      conditions: [{ predicate: 'heating_level', operator: 'gte', value: 3, bind: 'level' }],
      actions: [{ type: 'assert', predicate: 'dry_environment', value: true }]
    });

    expect(result.warnings.map(w => w.message)).toEqual(['Variable "$level" is bound but never used']);
  });

  describe('validateMany()', () => {
    it('requires an array', () => {
      expect(validator.validateMany({}).errors[0]?.message).toBe('Input must be an array of rules');
    });

    it('detects duplicate ids and prefixes paths', () => {
      const result = validator.validateMany([validRule, { ...validRule, id: 'R2', conditions: 'none' }, validRule]);

      expect(result.errors.map(e => `${e.path}: ${e.message}`)).toEqual([
        '[1].conditions: Conditions must be an array',
        '[2].id: Duplicate rule ID: R1'
      ]);
    });
  });
});

describe('RuleValidationError', () => {
  it('summarizes the first error', () => {
    const result = new RuleInputValidator().validate({});

    const error = RuleValidationError.fromResult('Rule "x"', result);

    expect(error.message).toBe('Rule "x" is invalid: id: Required field "id" is missing (+2 more)');
    expect(error.statusCode).toBe(400);
    expect(error.details).toHaveLength(3);
  });
});
