import { describe, it, expect } from 'vitest';
import {
  CliError,
  FileNotFoundError,
  InvalidArgumentsError,
  ValidationError,
  formatError,
  getExitCode
} from '../../../src/cli/utils/errors.js';
import { ExitCode } from '../../../src/cli/types.js';

describe('CLI errors', () => {
  it('maps errors to exit codes', () => {
    expect(getExitCode(new CliError('x'))).toBe(ExitCode.GeneralError);
    expect(getExitCode(new InvalidArgumentsError('x'))).toBe(ExitCode.InvalidArguments);
    expect(getExitCode(new ValidationError('x'))).toBe(ExitCode.ValidationError);
    expect(getExitCode(new FileNotFoundError('rules.yaml'))).toBe(ExitCode.FileNotFound);
    expect(getExitCode(new Error('x'))).toBe(ExitCode.GeneralError);
  });

  it('formats validation issues below the message', () => {
    const error = new ValidationError('Validation failed with 1 error(s)', [
      { path: '[0].id', message: 'Field "id" cannot be empty', severity: 'error' },
      { path: '[0].actions[0].value', message: 'Variable "$x" is referenced before any condition binds it', severity: 'warning' }
    ]);

    expect(formatError(error)).toBe([
      'Validation failed with 1 error(s)',
      '  ✗ [0].id: Field "id" cannot be empty',
      '  ⚠ [0].actions[0].value: Variable "$x" is referenced before any condition binds it'
    ].join('\n'));
  });

  it('formats other errors', () => {
    expect(formatError(new FileNotFoundError('rules.yaml'))).toBe('File not found: rules.yaml');
    expect(formatError(new Error('boom'))).toBe('boom');
    expect(formatError('plain')).toBe('plain');
  });
});
