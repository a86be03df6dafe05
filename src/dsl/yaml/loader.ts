/**
 * YAML loader pro báze znalostí.
 *
 * Podporuje tři formáty YAML vstupu:
 * - Jeden objekt pravidla
 * - Pole pravidel (YAML sequence na top-level)
 * - Objekt s klíčem `rules` obsahující pole pravidel
 *
 * JSON je podmnožina YAML, takže stejné funkce načtou i `.json` soubory.
 *
 * @example
 * ```typescript
 * import { loadRulesFromYAML, loadRulesFromFile } from 'forward-rules/dsl';
 *
 * // Z YAML řetězce
 * const rules = loadRulesFromYAML(`
 *   id: R001
 *   conditions:
 *     - predicate: location
 *       operator: eq
 *       value: indoor
 *   actions:
 *     - type: assert
 *       predicate: indoor_compatible
 *       value: true
 * `);
 *
 * // Ze souboru
 * const fileRules = await loadRulesFromFile('./knowledge/botanical.yaml');
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { validateRule, YamlValidationError } from './schema.js';
import type { RuleInput } from '../../types/rule.js';
import { DslError } from '../helpers/errors.js';
import { isObject } from '../../validation/types.js';

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class YamlLoadError extends DslError {
  constructor(message: string, readonly filePath?: string | undefined) {
    super(filePath ? `${filePath}: ${message}` : message);
    this.name = 'YamlLoadError';
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Surové položky pravidel z jednoho YAML dokumentu */
export interface RuleDocument {
  items: unknown[];
  /** Dokument obsahoval jeden objekt pravidla, ne seznam */
  single: boolean;
}

/**
 * Parsuje YAML a vrací surové položky pravidel bez validace jejich struktury.
 *
 * @throws {YamlLoadError} Při YAML syntaktické chybě, prázdném vstupu
 *                         nebo neočekávaném tvaru dokumentu
 */
export function parseRuleDocument(yamlContent: string): RuleDocument {
  let parsed: unknown;
  try {
    parsed = parse(yamlContent);
  } catch (err) {
    throw new YamlLoadError(
      `YAML syntax error: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (parsed === null || parsed === undefined) {
    throw new YamlLoadError('YAML content is empty');
  }

  // Top-level pole pravidel
  if (Array.isArray(parsed)) {
    if (parsed.length === 0) {
      throw new YamlLoadError('YAML array is empty, expected at least one rule');
    }
    return { items: parsed, single: false };
  }

  if (!isObject(parsed)) {
    throw new YamlLoadError(`Expected YAML object or array, got ${typeof parsed}`);
  }

  // Objekt s klíčem `rules`
  const rulesField = parsed['rules'];
  if (rulesField !== undefined) {
    if (!Array.isArray(rulesField)) {
      throw new YamlLoadError('"rules" must be an array');
    }
    if (rulesField.length === 0) {
      throw new YamlLoadError('"rules" array is empty, expected at least one rule');
    }
    return { items: rulesField, single: false };
  }

  // Jeden objekt pravidla
  return { items: [parsed], single: true };
}

/**
 * Parsuje YAML řetězec a vrací pole strukturálně validních pravidel.
 *
 * @throws {YamlLoadError} Při YAML syntaktické chybě nebo prázdném vstupu
 * @throws {YamlValidationError} Při validační chybě struktury pravidla
 */
export function loadRulesFromYAML(yamlContent: string): RuleInput[] {
  const { items, single } = parseRuleDocument(yamlContent);
  return items.map((item: unknown, i: number) => validateRule(item, single ? 'rule' : `rules[${i}]`));
}

/**
 * Načte pravidla z YAML (nebo JSON) souboru.
 *
 * @throws {YamlLoadError} Při chybě čtení souboru, YAML syntaxi nebo struktuře pravidla
 */
export async function loadRulesFromFile(filePath: string): Promise<RuleInput[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new YamlLoadError(
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  try {
    return loadRulesFromYAML(content);
  } catch (err) {
    if (err instanceof YamlLoadError || err instanceof YamlValidationError) {
      throw new YamlLoadError(err.message, filePath);
    }
    throw err;
  }
}
