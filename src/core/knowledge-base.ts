import type { Rule, RuleInput } from '../types/rule.js';
import type { KnowledgeSource } from '../types/knowledge.js';
import { createRule } from './rule-factory.js';
import { DuplicateRuleError } from './errors.js';

/**
 * Báze znalostí v paměti s indexací podle domény a tagů.
 *
 * Pravidla se vrací v pořadí registrace - na něm závisí createSeq
 * aktivací a tím i strategie definition_order.
 */
export class KnowledgeBase implements KnowledgeSource {
  private rules: Map<string, Rule> = new Map();
  private byDomain: Map<string, Set<string>> = new Map();
  private byTags: Map<string, Set<string>> = new Map();

  /**
   * Vytvoří bázi ze seznamu vstupů.
   */
  static from(inputs: readonly RuleInput[]): KnowledgeBase {
    const kb = new KnowledgeBase();
    kb.registerMany(inputs);
    return kb;
  }

  /**
   * Registruje nové pravidlo.
   *
   * @throws {DuplicateRuleError} Pokud pravidlo se stejným ID existuje
   * @throws {RuleValidationError} Pokud vstup není platné pravidlo
   */
  register(input: RuleInput): Rule {
    if (this.rules.has(input.id)) {
      throw new DuplicateRuleError(input.id);
    }

    const rule = createRule(input);
    this.rules.set(rule.id, rule);
    this.indexRule(rule);
    return rule;
  }

  /**
   * Registruje více pravidel. Při chybě zůstanou dříve registrovaná.
   */
  registerMany(inputs: readonly RuleInput[]): Rule[] {
    return inputs.map(input => this.register(input));
  }

  /**
   * Odregistruje pravidlo.
   */
  unregister(ruleId: string): boolean {
    const rule = this.rules.get(ruleId);
    if (!rule) return false;

    this.unindexRule(rule);
    this.rules.delete(ruleId);
    return true;
  }

  /**
   * Povolí pravidlo.
   */
  enable(ruleId: string): boolean {
    return this.setActive(ruleId, true);
  }

  /**
   * Zakáže pravidlo - engine ho při Match přeskočí.
   */
  disable(ruleId: string): boolean {
    return this.setActive(ruleId, false);
  }

  getRule(ruleId: string): Rule | undefined {
    return this.rules.get(ruleId);
  }

  /**
   * Všechna pravidla v pořadí registrace.
   */
  listRules(): Rule[] {
    return [...this.rules.values()];
  }

  getByDomain(domain: string): Rule[] {
    return this.resolve(this.byDomain.get(domain));
  }

  getByTag(tag: string): Rule[] {
    return this.resolve(this.byTags.get(tag));
  }

  /** Domény v pořadí prvního výskytu */
  domains(): string[] {
    return [...this.byDomain]
      .filter(([, ids]) => ids.size > 0)
      .map(([domain]) => domain);
  }

  get size(): number {
    return this.rules.size;
  }

  private setActive(ruleId: string, active: boolean): boolean {
    const rule = this.rules.get(ruleId);
    if (!rule) return false;

    // Pravidla jsou zmrazená - nahradí se kopií (pořadí v Map zůstává)
    if (rule.active !== active) {
      this.rules.set(ruleId, Object.freeze({ ...rule, active }));
    }
    return true;
  }

  private resolve(ids: Set<string> | undefined): Rule[] {
    if (!ids) return [];
    const result: Rule[] = [];
    for (const rule of this.rules.values()) {
      if (ids.has(rule.id)) result.push(rule);
    }
    return result;
  }

  private indexRule(rule: Rule): void {
    this.addToIndex(this.byDomain, rule.domain, rule.id);
    for (const tag of rule.tags) {
      this.addToIndex(this.byTags, tag, rule.id);
    }
  }

  private unindexRule(rule: Rule): void {
    this.byDomain.get(rule.domain)?.delete(rule.id);
    for (const tag of rule.tags) {
      this.byTags.get(tag)?.delete(rule.id);
    }
  }

  private addToIndex(index: Map<string, Set<string>>, key: string, ruleId: string): void {
    let set = index.get(key);
    if (!set) {
      set = new Set();
      index.set(key, set);
    }
    set.add(ruleId);
  }
}
