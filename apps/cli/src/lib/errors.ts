import { CardInputError } from '@statforge/card-adapter';
import { FontLoadError } from '@statforge/style-engine';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'MISSING_REQUIRED'
  | 'FILE_READ_ERROR'
  | 'FILE_WRITE_ERROR'
  | 'YAML_PARSE_ERROR'
  | 'VALIDATION_ERROR'
  | 'FONT_LOAD_FAILED'
  | 'NO_CARDS'
  | 'COMMAND_FAILED';

export class CliError extends Error {
  readonly code: CliErrorCode;
  readonly details?: unknown;
  readonly exitCode: number;

  constructor(code: CliErrorCode, message: string, details?: unknown, exitCode = 1) {
    super(message);
    Object.setPrototypeOf(this, CliError.prototype);
    this.name = 'CliError';
    this.code = code;
    this.details = details;
    this.exitCode = exitCode;
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;

  if (error instanceof CardInputError) {
    return new CliError('VALIDATION_ERROR', error.message, { code: error.code, entity: error.entity });
  }

  if (error instanceof FontLoadError) {
    return new CliError('FONT_LOAD_FAILED', error.message, { code: error.code, font: error.fontName });
  }

  if (error instanceof Error) {
    return new CliError('COMMAND_FAILED', error.message, {
      name: error.name,
    });
  }

  return new CliError('COMMAND_FAILED', 'Unknown error', {
    error,
  });
}
