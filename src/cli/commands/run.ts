/**
 * Příkaz run pro CLI.
 * Načte bázi znalostí, spustí jeden dotaz a vypíše závěry.
 */

import type { GlobalOptions } from '../types.js';
import type { FactValue } from '../../types/fact.js';
import type { Conclusion, QueryResult } from '../../types/result.js';
import { InferenceEngine } from '../../core/inference-engine.js';
import { CONFLICT_STRATEGIES, isConflictStrategy } from '../../core/strategies.js';
import type { LogLevel } from '../../utils/logger.js';
import { loadFactsFile, loadKnowledgeBase, parseFactAssignment } from '../utils/file-loader.js';
import { CliError, InvalidArgumentsError } from '../utils/errors.js';
import { printData, print, colorize, success, warning } from '../utils/output.js';

/** Options pro příkaz run */
export interface RunOptions extends GlobalOptions {
  /** Soubor s počátečními fakty (JSON/YAML objekt) */
  facts: string | undefined;
  /** Fakta z příkazové řádky ve tvaru predikát=hodnota; přepisují soubor */
  fact: string[];
  strategy: string | undefined;
  maxCycles: number | undefined;
  trace: boolean;
  logLevel: LogLevel;
}

function formatValue(value: FactValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function formatConclusion(conclusion: Conclusion): string {
  return `  • ${colorize(conclusion.predicate, 'cyan')}: ${formatValue(conclusion.value)} ` +
    colorize(`(confidence ${conclusion.confidence.toFixed(2)}, ${conclusion.originRule})`, 'dim');
}

/**
 * Formátuje výsledek dotazu pro pretty formát.
 */
function formatPrettyOutput(result: QueryResult, withTrace: boolean): string {
  const lines: string[] = [];

  const headline = `Query ${result.state}: ${result.terminationReason}`;
  lines.push(result.success ? success(headline) : warning(headline));
  lines.push(colorize(
    `Strategy: ${result.strategy}  Cycles: ${result.cyclesExecuted}  ` +
    `Rules fired: ${result.rulesFired}  Facts derived: ${result.factsDerived}  ` +
    `(${result.elapsedMillis.toFixed(1)} ms)`,
    'dim'
  ));
  lines.push('');

  if (result.conclusions.length > 0) {
    lines.push(colorize('Conclusions:', 'bold'));
    lines.push(...result.conclusions.map(formatConclusion));
  } else {
    lines.push('No conclusions reached.');
  }

  if (result.derivedFacts.length > 0) {
    lines.push('');
    lines.push(colorize('Derived facts:', 'bold'));
    lines.push(...result.derivedFacts.map(formatConclusion));
  }

  if (withTrace) {
    const { cycles, agenda } = result.fullTrace;

    lines.push('');
    lines.push(colorize('Cycles:', 'bold'));
    for (const cycle of cycles) {
      const fired = cycle.ruleFired ?? 'no rule fired';
      const created = cycle.factsCreated.length > 0 ? cycle.factsCreated.join(', ') : 'none';
      lines.push(`  #${cycle.cycle} ${fired} (agenda ${cycle.agendaSize}, new facts: ${created})`);
    }

    lines.push('');
    lines.push(colorize('Decisions:', 'bold'));
    for (const decision of agenda.decisions) {
      lines.push(`  #${decision.sequence} ${decision.reason}`);
    }
  }

  return lines.join('\n');
}

function resolveFacts(options: RunOptions): Record<string, FactValue> {
  const facts: Record<string, FactValue> = options.facts !== undefined ? loadFactsFile(options.facts) : {};
  for (const assignment of options.fact) {
    const [predicate, value] = parseFactAssignment(assignment);
    facts[predicate] = value;
  }
  return facts;
}

/**
 * Akce příkazu run.
 */
export async function runCommand(rulesFile: string, options: RunOptions): Promise<void> {
  const { strategy, maxCycles } = options;

  if (strategy !== undefined && !isConflictStrategy(strategy)) {
    throw new InvalidArgumentsError(
      `Unknown strategy "${strategy}". Expected one of: ${CONFLICT_STRATEGIES.join(', ')}`
    );
  }
  if (maxCycles !== undefined && (!Number.isInteger(maxCycles) || maxCycles < 1)) {
    throw new InvalidArgumentsError(`--max-cycles must be an integer >= 1, got ${maxCycles}`);
  }

  const facts = resolveFacts(options);
  const { data: knowledge } = await loadKnowledgeBase(rulesFile);

  const engine = new InferenceEngine({
    name: 'cli',
    logLevel: options.logLevel,
    ...(strategy !== undefined && { strategy }),
    ...(maxCycles !== undefined && { maxCycles })
  });

  const result = engine.runQuery(knowledge, facts);

  if (options.format === 'json') {
    if (options.trace) {
      printData({ type: 'result', data: result });
    } else {
      const { fullTrace: _trace, ...summary } = result;
      printData({ type: 'result', data: summary });
    }
  } else {
    print(formatPrettyOutput(result, options.trace));
  }

  if (!result.success) {
    throw new CliError(`Query aborted: ${result.terminationReason}`);
  }
}
