import type { RuleCondition, RuleConditionInput } from './condition.js';
import type { RuleAction, RuleActionInput } from './action.js';

/** Produkční pravidlo - neměnné po vytvoření */
export interface Rule {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly domain: string;          // Např. "final_recommendation"
  readonly source: string;          // Zdroj znalosti
  readonly tags: readonly string[];
  readonly priority: number;        // Vyšší = dříve (strategie priority)
  readonly specificity: number;     // Výchozí: počet podmínek
  readonly complexity: number;      // Výchozí: podmínky + akce
  readonly active: boolean;

  // Podmínky (všechny musí platit, v pořadí)
  readonly conditions: readonly RuleCondition[];

  // Akce při splnění (v pořadí)
  readonly actions: readonly RuleAction[];
}

/** Pravidlo bez odvozených polí (pro registraci) */
export interface RuleInput {
  id: string;
  name?: string;
  description?: string;
  domain?: string;
  source?: string;
  tags?: string[];
  priority?: number;
  specificity?: number;
  complexity?: number;
  active?: boolean;
  conditions: RuleConditionInput[];
  actions: RuleActionInput[];
}
