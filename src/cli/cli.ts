/**
 * Hlavní CLI setup pomocí CAC.
 */

import { cac } from 'cac';
import { version } from '../utils/version.js';
import { DEFAULT_PORT } from '../api/config.js';
import { LOG_LEVELS, type LogLevel } from '../utils/logger.js';
import { OUTPUT_FORMATS, type GlobalOptions, type OutputFormat } from './types.js';
import { setOutputOptions, printError } from './utils/output.js';
import { getExitCode, formatError, InvalidArgumentsError } from './utils/errors.js';
import { validateCommand, type ValidateOptions } from './commands/validate.js';
import { runCommand, type RunOptions } from './commands/run.js';
import { serveCommand, type ServeOptions } from './commands/serve.js';

/** CLI instance */
const cli = cac('forward-rules');

/**
 * Promise z běžící async akce.
 * CAC neawaituje async action handlery — musíme to udělat sami.
 */
let _actionPromise: Promise<void> | undefined;

/** Obalí async action handler tak, aby se jeho Promise dala awaitovat v run(). */
function tracked<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => void {
  return (...args: T) => {
    _actionPromise = fn(...args);
  };
}

type RawOptions = Record<string, unknown>;

// CAC (mri) vrací čísla pro numerické hodnoty a pole pro opakované volby

function stringOption(options: RawOptions, key: string): string | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  if (typeof value === 'string' || typeof value === 'number') return String(value);
  throw new InvalidArgumentsError(`--${key} expects a single value`);
}

function numberOption(options: RawOptions, key: string): number | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentsError(`--${key} expects a number, got ${String(value)}`);
  }
  return parsed;
}

function listOption(options: RawOptions, key: string): string[] {
  const value = options[key];
  if (value === undefined) return [];
  return (Array.isArray(value) ? value : [value]).map(item => String(item));
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/** Zpracuje globální options */
function processGlobalOptions(options: RawOptions): GlobalOptions {
  const format = stringOption(options, 'format') ?? 'pretty';
  if (!isOutputFormat(format)) {
    throw new InvalidArgumentsError(`Unknown format "${format}". Expected one of: ${OUTPUT_FORMATS.join(', ')}`);
  }

  const quiet = options['quiet'] === true;
  // --no-color nastaví color: false
  const noColor = options['color'] === false;

  setOutputOptions({ format, quiet, noColor });

  return { format, quiet, noColor };
}

/** Spustí akci příkazu a převede chybu na exit kód */
async function execute(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    printError(formatError(err));
    process.exit(getExitCode(err));
  }
}

/** Registruje globální options */
function registerGlobalOptions(): void {
  cli
    .option('-f, --format <format>', 'Output format: pretty, json')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output');
}

/** Registruje příkaz version */
function registerVersionCommand(): void {
  cli.command('version', 'Show version information').action(() => {
    console.log(`forward-rules v${version}`);
  });
}

/** Registruje příkaz validate */
function registerValidateCommand(): void {
  cli
    .command('validate <file>', 'Validate a rules file (YAML or JSON)')
    .option('-s, --strict', 'Also report variables that are bound but never used')
    .action(tracked((file: string, options: RawOptions) => execute(async () => {
      const validateOptions: ValidateOptions = {
        ...processGlobalOptions(options),
        strict: options['strict'] === true
      };
      await validateCommand(file, validateOptions);
    })));
}

/** Registruje příkaz run */
function registerRunCommand(): void {
  cli
    .command('run <rules>', 'Run one query against a knowledge base')
    .option('--facts <file>', 'Initial facts as a JSON or YAML object')
    .option('--fact <predicate=value>', 'Initial fact, may be repeated')
    .option('--strategy <strategy>', 'Conflict resolution strategy')
    .option('--max-cycles <n>', 'Cycle limit')
    .option('--trace', 'Include cycles and conflict decisions in the output')
    .option('--log-level <level>', 'Engine log level', { default: 'warn' })
    .action(tracked((rules: string, options: RawOptions) => execute(async () => {
      const logLevel = stringOption(options, 'logLevel') ?? 'warn';
      if (!isLogLevel(logLevel)) {
        throw new InvalidArgumentsError(`Unknown log level "${logLevel}". Expected one of: ${LOG_LEVELS.join(', ')}`);
      }

      const runOptions: RunOptions = {
        ...processGlobalOptions(options),
        facts: stringOption(options, 'facts'),
        fact: listOption(options, 'fact'),
        strategy: stringOption(options, 'strategy'),
        maxCycles: numberOption(options, 'maxCycles'),
        trace: options['trace'] === true,
        logLevel
      };
      await runCommand(rules, runOptions);
    })));
}

/** Registruje příkaz serve */
function registerServeCommand(): void {
  cli
    .command('serve <rules>', 'Start the HTTP query service')
    .option('-p, --port <port>', 'Server port', { default: DEFAULT_PORT })
    .option('-H, --host <host>', 'Server host', { default: '0.0.0.0' })
    .option('--strategy <strategy>', 'Default conflict resolution strategy')
    .option('--no-logger', 'Disable request logging')
    .action(tracked((rules: string, options: RawOptions) => execute(async () => {
      const serveOptions: ServeOptions = {
        ...processGlobalOptions(options),
        port: numberOption(options, 'port') ?? DEFAULT_PORT,
        host: stringOption(options, 'host') ?? '0.0.0.0',
        noLogger: options['logger'] === false,
        strategy: stringOption(options, 'strategy')
      };
      await serveCommand(rules, serveOptions);
    })));
}

/**
 * Zaregistruje příkazy a zpracuje argumenty.
 */
export async function run(args: string[] = process.argv): Promise<void> {
  registerGlobalOptions();
  registerVersionCommand();
  registerValidateCommand();
  registerRunCommand();
  registerServeCommand();

  cli.help();
  cli.version(version);

  try {
    cli.parse(args);
    if (_actionPromise) {
      await _actionPromise;
    }
  } catch (err) {
    printError(formatError(err));
    process.exit(getExitCode(err));
  }
}

export { cli };
