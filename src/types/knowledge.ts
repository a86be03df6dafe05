import type { Rule } from './rule.js';

/** Zdroj znalostí - cokoliv, co umí vydat pravidla */
export interface KnowledgeSource {
  listRules(): readonly Rule[];
  getRule(id: string): Rule | undefined;
}
