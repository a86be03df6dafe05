import { describe, it, expect } from 'vitest';
import { Bindings, isVariableRef } from '../../../src/evaluation/bindings.js';

describe('isVariableRef', () => {
  it('accepts an object with a single string var key', () => {
    expect(isVariableRef({ var: 'x' })).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isVariableRef({ var: 1 })).toBe(false);
    expect(isVariableRef({ var: 'x', other: 1 })).toBe(false);
    expect(isVariableRef(['x'])).toBe(false);
    expect(isVariableRef('$x')).toBe(false);
    expect(isVariableRef(null)).toBe(false);
  });
});

describe('Bindings', () => {
  it('binds and reads variables', () => {
    const bindings = new Bindings({ a: 1 });
    bindings.bind('b', 'two');

    expect(bindings.get('a')).toBe(1);
    expect(bindings.get('b')).toBe('two');
    expect(bindings.has('c')).toBe(false);
    expect(bindings.size).toBe(2);
  });

  it('resolves literals unchanged', () => {
    const bindings = new Bindings();

    expect(bindings.resolve('indoor')).toEqual({ ok: true, value: 'indoor' });
    expect(bindings.resolve(undefined)).toEqual({ ok: true, value: undefined });
  });

  it('resolves references to bound values', () => {
    const bindings = new Bindings({ level: 3 });

    expect(bindings.resolve({ var: 'level' })).toEqual({ ok: true, value: 3 });
  });

  it('reports unbound variables', () => {
    expect(new Bindings().resolve({ var: 'missing' })).toEqual({ ok: false, error: 'Unbound variable: $missing' });
  });

  it('clones independently', () => {
    const original = new Bindings({ a: 1 });
    const copy = original.clone();
    copy.bind('a', 2);

    expect(original.toRecord()).toEqual({ a: 1 });
    expect(copy.toRecord()).toEqual({ a: 2 });
  });

  it('builds an order independent key', () => {
    expect(Bindings.key({ a: 1, b: { y: 2, x: 1 } })).toBe(Bindings.key({ b: { x: 1, y: 2 }, a: 1 }));
    expect(Bindings.key({ a: 1 })).not.toBe(Bindings.key({ a: 2 }));
    expect(Bindings.key({})).toBe('[]');
  });
});
