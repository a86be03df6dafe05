/**
 * Příkaz validate pro CLI.
 * Validuje pravidla ze souboru (YAML nebo JSON).
 */

import type { GlobalOptions } from '../types.js';
import { RuleInputValidator } from '../../validation/rule-validator.js';
import type { ValidationIssue } from '../../validation/types.js';
import { loadRuleItems } from '../utils/file-loader.js';
import { ValidationError } from '../utils/errors.js';
import { printData, print, success, colorize } from '../utils/output.js';

/** Options pro příkaz validate */
export interface ValidateOptions extends GlobalOptions {
  strict: boolean;
}

/** Výsledek validace pro zobrazení */
interface ValidateOutput {
  file: string;
  valid: boolean;
  ruleCount: number;
  errorCount: number;
  warningCount: number;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * Formátuje výstup validace pro pretty formát.
 */
function formatPrettyOutput(output: ValidateOutput): string {
  const lines: string[] = [];

  lines.push(colorize(`File: ${output.file}`, 'bold'));
  lines.push(`Rules: ${output.ruleCount}`);
  lines.push('');

  if (output.valid && output.warningCount === 0) {
    lines.push(success('All rules are valid'));
  } else if (output.valid) {
    lines.push(success(`Valid with ${output.warningCount} warning(s)`));
  } else {
    lines.push(colorize(`✗ ${output.errorCount} error(s), ${output.warningCount} warning(s)`, 'red'));
  }

  if (output.errors.length > 0) {
    lines.push('');
    lines.push(colorize('Errors:', 'red'));
    for (const err of output.errors) {
      lines.push(`  ${colorize('✗', 'red')} ${colorize(err.path, 'cyan')}: ${err.message}`);
    }
  }

  if (output.warnings.length > 0) {
    lines.push('');
    lines.push(colorize('Warnings:', 'yellow'));
    for (const warn of output.warnings) {
      lines.push(`  ${colorize('⚠', 'yellow')} ${colorize(warn.path, 'cyan')}: ${warn.message}`);
    }
  }

  return lines.join('\n');
}

/**
 * Akce příkazu validate.
 */
export async function validateCommand(file: string, options: ValidateOptions): Promise<void> {
  const validator = new RuleInputValidator({ strict: options.strict });

  const { data: items, path } = loadRuleItems(file);
  const result = validator.validateMany(items);

  const output: ValidateOutput = {
    file: path,
    valid: result.valid,
    ruleCount: items.length,
    errorCount: result.errors.length,
    warningCount: result.warnings.length,
    errors: result.errors,
    warnings: result.warnings
  };

  if (options.format === 'json') {
    printData({
      type: 'validation',
      data: output
    });
  } else {
    print(formatPrettyOutput(output));
  }

  if (!result.valid) {
    throw new ValidationError(
      `Validation failed with ${result.errors.length} error(s)`,
      result.errors
    );
  }
}
