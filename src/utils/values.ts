import { isDeepStrictEqual } from 'node:util';
import type { FactValue } from '../types/fact.js';

/**
 * Strukturální rovnost hodnot faktů.
 * Skaláry se porovnávají pomocí `===`, kolekce do hloubky.
 */
export function valuesEqual(a: FactValue | undefined, b: FactValue | undefined): boolean {
  if (a === b) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }
  return isDeepStrictEqual(a, b);
}

/**
 * Zmrazí objekt včetně všech vnořených objektů a polí.
 */
export function deepFreeze<T extends object>(value: T): T {
  const items: unknown[] = Object.values(value);
  for (const item of items) {
    if (typeof item === 'object' && item !== null && !Object.isFrozen(item)) {
      deepFreeze(item);
    }
  }
  Object.freeze(value);
  return value;
}

/**
 * Převede hodnotu na číslo. Přijímá čísla a numerické řetězce,
 * pro cokoliv jiného vrací undefined.
 */
export function toNumber(value: FactValue | undefined): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/** Textová podoba hodnoty pro substring a regex operace */
export function stringify(value: FactValue): string {
  if (typeof value === 'string') return value;
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/**
 * Validuje a převede neznámou hodnotu (např. z YAML/JSON) na FactValue.
 * Vrací undefined pro hodnoty, které nejsou JSON-kompatibilní.
 */
export function toFactValue(value: unknown): FactValue | undefined {
  if (value === null) return null;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : undefined;
    case 'object': {
      if (Array.isArray(value)) {
        const items: FactValue[] = [];
        for (const item of value) {
          const converted = toFactValue(item);
          if (converted === undefined) return undefined;
          items.push(converted);
        }
        return items;
      }
      const result: { [key: string]: FactValue } = {};
      for (const [key, item] of Object.entries(value)) {
        const converted = toFactValue(item);
        if (converted === undefined) return undefined;
        result[key] = converted;
      }
      return result;
    }
    default:
      return undefined;
  }
}

/**
 * Textové "true"/"false" (bez ohledu na velikost písmen) jako boolean.
 * Pro jiný text vrací undefined.
 */
export function parseBooleanText(text: string): boolean | undefined {
  const lowered = text.toLowerCase();
  if (lowered === 'true') return true;
  if (lowered === 'false') return false;
  return undefined;
}
