/**
 * Minimální logger používaný jádrem enginu.
 *
 * Výchozí implementace zapisuje do `console` s prefixem `[name]`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[];

/**
 * Vytvoří logger s prefixem a filtrem úrovně.
 * Pokud je zadán `target`, zprávy se předávají jemu místo `console`.
 */
export function createLogger(name: string, level: LogLevel = 'warn', target: Logger = console): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${name}]`;

  const write = (lvl: Exclude<LogLevel, 'silent'>, message: string, meta: unknown[]): void => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    target[lvl](`${prefix} ${message}`, ...meta);
  };

  return {
    debug: (message, ...meta) => write('debug', message, meta),
    info: (message, ...meta) => write('info', message, meta),
    warn: (message, ...meta) => write('warn', message, meta),
    error: (message, ...meta) => write('error', message, meta)
  };
}

/** Logger, který nic nevypisuje */
export const silentLogger: Logger = createLogger('silent', 'silent');

/** Převede neznámou chybu na zprávu */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
