export { loadRulesFromYAML, loadRulesFromFile, parseRuleDocument, YamlLoadError, type RuleDocument } from './loader.js';
export { validateRule, YamlValidationError } from './schema.js';
