/**
 * Utility pro načítání bází znalostí a faktů ze souborů.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import type { RuleInput } from '../../types/rule.js';
import type { FactValue } from '../../types/fact.js';
import { loadRulesFromFile, parseRuleDocument, YamlLoadError } from '../../dsl/yaml/loader.js';
import { isObject } from '../../validation/types.js';
import { RuleValidationError } from '../../validation/rule-validation-error.js';
import { KnowledgeBase } from '../../core/knowledge-base.js';
import { DuplicateRuleError } from '../../core/errors.js';
import { parseBooleanText, toFactValue } from '../../utils/values.js';
import { FileNotFoundError, InvalidArgumentsError, ValidationError } from './errors.js';

/** Výsledek načtení souboru */
export interface LoadResult<T> {
  data: T;
  path: string;
}

function requireFile(filePath: string): string {
  const absolutePath = resolve(filePath);
  if (!existsSync(absolutePath)) {
    throw new FileNotFoundError(filePath);
  }
  return absolutePath;
}

/**
 * Načte surové položky pravidel (YAML nebo JSON) bez validace struktury.
 * @throws FileNotFoundError pokud soubor neexistuje
 * @throws ValidationError pokud soubor nejde parsovat
 */
export function loadRuleItems(filePath: string): LoadResult<unknown[]> {
  const absolutePath = requireFile(filePath);

  try {
    const { items } = parseRuleDocument(readFileSync(absolutePath, 'utf-8'));
    return { data: items, path: absolutePath };
  } catch (err) {
    if (err instanceof YamlLoadError) {
      throw new ValidationError(err.message, [], err);
    }
    throw err;
  }
}

/**
 * Načte strukturálně platná pravidla.
 * @throws FileNotFoundError pokud soubor neexistuje
 * @throws ValidationError pokud soubor neobsahuje platná pravidla
 */
export async function loadRules(filePath: string): Promise<LoadResult<RuleInput[]>> {
  const absolutePath = requireFile(filePath);

  try {
    return { data: await loadRulesFromFile(absolutePath), path: absolutePath };
  } catch (err) {
    if (err instanceof YamlLoadError) {
      throw new ValidationError(err.message, [], err);
    }
    throw err;
  }
}

/**
 * Načte soubor pravidel a zaregistruje je do nové báze znalostí.
 * @throws FileNotFoundError pokud soubor neexistuje
 * @throws ValidationError pokud pravidla nejsou platná nebo se opakuje ID
 */
export async function loadKnowledgeBase(filePath: string): Promise<LoadResult<KnowledgeBase>> {
  const { data: rules, path } = await loadRules(filePath);

  try {
    return { data: KnowledgeBase.from(rules), path };
  } catch (err) {
    if (err instanceof RuleValidationError) {
      throw new ValidationError(err.message, err.issues, err);
    }
    if (err instanceof DuplicateRuleError) {
      throw new ValidationError(err.message, [], err);
    }
    throw err;
  }
}

/**
 * Načte počáteční fakta z JSON nebo YAML objektu `{ predikát: hodnota }`.
 * @throws FileNotFoundError pokud soubor neexistuje
 * @throws ValidationError pokud obsah není objekt JSON-kompatibilních hodnot
 */
export function loadFactsFile(filePath: string): Record<string, FactValue> {
  const absolutePath = requireFile(filePath);

  let parsed: unknown;
  try {
    parsed = parse(readFileSync(absolutePath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Invalid facts file: ${message}`);
  }

  if (!isObject(parsed)) {
    throw new ValidationError('Facts file must contain an object of predicate: value pairs');
  }

  const facts: Record<string, FactValue> = {};
  for (const [predicate, raw] of Object.entries(parsed)) {
    const value = toFactValue(raw);
    if (value === undefined) {
      throw new ValidationError(`Fact "${predicate}" has an unsupported value`);
    }
    facts[predicate] = value;
  }
  return facts;
}

const NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Parsuje `--fact predikát=hodnota`.
 *
 * "true"/"false" jsou booleany, celá a desetinná čísla čísla,
 * cokoliv jiného zůstává textem.
 *
 * @throws InvalidArgumentsError pro chybějící `=` nebo prázdný predikát
 */
export function parseFactAssignment(assignment: string): [string, FactValue] {
  const separator = assignment.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentsError(`Invalid fact "${assignment}", expected predicate=value`);
  }

  const predicate = assignment.slice(0, separator).trim();
  const text = assignment.slice(separator + 1).trim();
  if (predicate === '') {
    throw new InvalidArgumentsError(`Invalid fact "${assignment}", predicate is empty`);
  }

  const flag = parseBooleanText(text);
  if (flag !== undefined) {
    return [predicate, flag];
  }
  if (NUMBER_PATTERN.test(text)) {
    return [predicate, Number(text)];
  }
  return [predicate, text];
}
