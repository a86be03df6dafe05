/**
 * CLI typy pro forward-rules.
 */

/** Podporované výstupní formáty */
export type OutputFormat = 'json' | 'pretty';

export const OUTPUT_FORMATS = ['pretty', 'json'] as const satisfies readonly OutputFormat[];

/** Exit kódy CLI */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  InvalidArguments: 2,
  ValidationError: 3,
  FileNotFound: 4
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Globální CLI options */
export interface GlobalOptions {
  format: OutputFormat;
  quiet: boolean;
  noColor: boolean;
}

/** Formátovatelná data pro výstup */
export interface FormattableData {
  type: 'validation' | 'result' | 'message' | 'error';
  data: unknown;
  meta?: Record<string, unknown>;
}
