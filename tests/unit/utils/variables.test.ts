import { describe, it, expect } from 'vitest';
import { isValidVariableName, normalizeOperand, referencedVariable } from '../../../src/utils/variables.js';

describe('variables', () => {
  it('recognizes references', () => {
    expect(referencedVariable('$level')).toBe('level');
    expect(referencedVariable({ var: 'level' })).toBe('level');
    expect(referencedVariable('$$level')).toBeUndefined();
    expect(referencedVariable('level')).toBeUndefined();
  });

  it('normalizes operands', () => {
    expect(normalizeOperand('$level')).toEqual({ var: 'level' });
    expect(normalizeOperand('$$price')).toBe('$price');
    expect(normalizeOperand(['a', 1])).toEqual(['a', 1]);
    expect(normalizeOperand(undefined)).toBeUndefined();
  });

  it('validates variable names', () => {
    expect(isValidVariableName('plant_1')).toBe(true);
    expect(isValidVariableName('1plant')).toBe(false);
    expect(isValidVariableName('')).toBe(false);
  });
});
