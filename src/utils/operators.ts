import type { ConditionOperator } from '../types/condition.js';
import type { FactValue } from '../types/fact.js';
import { stringify, toNumber, valuesEqual } from './values.js';

/** Výsledek aplikace operátoru */
export type OperatorOutcome =
  | { ok: true; passed: boolean; reason?: string }
  | { ok: false; error: string };

/** Maximální počet zkompilovaných vzorů v cache */
export const MATCHES_CACHE_LIMIT = 256;

/**
 * Cache pro RegExp objekty v matches operátoru.
 * Vzor může pocházet z navázané proměnné, tedy ze vstupu dotazu,
 * proto je velikost omezená a nejstarší záznam se vyřazuje.
 */
const matchesRegexCache = new Map<string, RegExp>();

/**
 * Vyčistí cache regex objektů. Užitečné pro testy.
 */
export function clearMatchesCache(): void {
  matchesRegexCache.clear();
}

/** Počet vzorů v cache */
export function matchesCacheSize(): number {
  return matchesRegexCache.size;
}

function getRegex(pattern: string): RegExp {
  let regex = matchesRegexCache.get(pattern);
  if (!regex) {
    regex = new RegExp(pattern);
    if (matchesRegexCache.size >= MATCHES_CACHE_LIMIT) {
      evictOldestPattern();
    }
    matchesRegexCache.set(pattern, regex);
  }
  return regex;
}

function evictOldestPattern(): void {
  const oldest = matchesRegexCache.keys().next();
  if (!oldest.done) {
    matchesRegexCache.delete(oldest.value);
  }
}

function compareNumeric(
  value: FactValue,
  compareValue: FactValue,
  compare: (a: number, b: number) => boolean
): OperatorOutcome {
  const a = toNumber(value);
  const b = toNumber(compareValue);
  if (a === undefined || b === undefined) {
    return { ok: true, passed: false, reason: 'not_numeric' };
  }
  return { ok: true, passed: compare(a, b) };
}

function isMember(value: FactValue, collection: FactValue): boolean {
  if (Array.isArray(collection)) {
    return collection.some(item => valuesEqual(item, value));
  }
  return stringify(collection).includes(stringify(value));
}

/**
 * Aplikuje operátor na hodnotu existujícího faktu.
 *
 * `exists` / `not_exists` sem nepatří - ty testují pouze přítomnost faktu
 * a řeší je ConditionEvaluator.
 */
export function applyOperator(
  operator: Exclude<ConditionOperator, 'exists' | 'not_exists'>,
  value: FactValue,
  compareValue: FactValue
): OperatorOutcome {
  switch (operator) {
    case 'eq':
      return { ok: true, passed: valuesEqual(value, compareValue) };

    case 'neq':
      return { ok: true, passed: !valuesEqual(value, compareValue) };

    case 'gt':
      return compareNumeric(value, compareValue, (a, b) => a > b);

    case 'gte':
      return compareNumeric(value, compareValue, (a, b) => a >= b);

    case 'lt':
      return compareNumeric(value, compareValue, (a, b) => a < b);

    case 'lte':
      return compareNumeric(value, compareValue, (a, b) => a <= b);

    case 'in':
      return { ok: true, passed: isMember(value, compareValue) };

    case 'not_in':
      return { ok: true, passed: !isMember(value, compareValue) };

    case 'contains':
      if (Array.isArray(value)) {
        return { ok: true, passed: value.some(item => valuesEqual(item, compareValue)) };
      }
      if (typeof value === 'string') {
        return { ok: true, passed: value.includes(stringify(compareValue)) };
      }
      return { ok: true, passed: false, reason: 'not_a_collection' };

    case 'matches': {
      let regex: RegExp;
      try {
        regex = getRegex(stringify(compareValue));
      } catch (error) {
        return { ok: false, error: `Invalid pattern: ${error instanceof Error ? error.message : String(error)}` };
      }
      return { ok: true, passed: regex.test(stringify(value)) };
    }

    default: {
      const unreachable: never = operator;
      return { ok: false, error: `Unknown operator: ${String(unreachable)}` };
    }
  }
}
