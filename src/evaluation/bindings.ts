import type { FactValue } from '../types/fact.js';
import type { Operand, VariableRef } from '../types/condition.js';

/** Výsledek resolvování operandu */
export type ResolveResult =
  | { ok: true; value: FactValue | undefined }
  | { ok: false; error: string };

/**
 * Type-guard pro referenci na proměnnou.
 */
export function isVariableRef(value: unknown): value is VariableRef {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const keys = Object.keys(value);
  return keys.length === 1 && keys[0] === 'var' && 'var' in value && typeof value.var === 'string';
}

/**
 * Vazby proměnných jedné instance pravidla.
 *
 * Proměnné se navazují podmínkami (`bind`) a čtou se přes `{ var }` reference
 * v operandech podmínek a hodnotách akcí.
 */
export class Bindings {
  private readonly values: Map<string, FactValue>;

  constructor(initial: Readonly<Record<string, FactValue>> = {}) {
    this.values = new Map(Object.entries(initial));
  }

  bind(name: string, value: FactValue): void {
    this.values.set(name, value);
  }

  get(name: string): FactValue | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get size(): number {
    return this.values.size;
  }

  /**
   * Resolvuje operand: literál vrací beze změny, reference se nahradí
   * navázanou hodnotou. Nenavázaná proměnná je chyba.
   */
  resolve(operand: Operand | undefined): ResolveResult {
    if (operand === undefined || !isVariableRef(operand)) {
      return { ok: true, value: operand };
    }
    if (!this.values.has(operand.var)) {
      return { ok: false, error: `Unbound variable: $${operand.var}` };
    }
    return { ok: true, value: this.values.get(operand.var) };
  }

  /** Kopie vazeb jako prostý objekt (pro agendu a trace) */
  toRecord(): Record<string, FactValue> {
    return Object.fromEntries(this.values);
  }

  clone(): Bindings {
    return new Bindings(this.toRecord());
  }

  /**
   * Kanonický klíč nezávislý na pořadí navazování.
   * Dvě instance se stejným klíčem jsou z pohledu agendy duplikáty.
   */
  static key(bindings: Readonly<Record<string, FactValue>>): string {
    const entries = Object.keys(bindings)
      .sort()
      .map(name => [name, canonical(bindings[name] ?? null)]);
    return JSON.stringify(entries);
  }
}

function canonical(value: FactValue): FactValue {
  if (Array.isArray(value)) {
    return value.map(canonical);
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: { [key: string]: FactValue } = {};
    for (const key of Object.keys(value).sort()) {
      const item = value[key];
      if (item !== undefined) sorted[key] = canonical(item);
    }
    return sorted;
  }
  return value;
}
