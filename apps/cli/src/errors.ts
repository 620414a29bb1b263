import { isPipelineError } from '@tabletalk/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_RUN_FAILED = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'CONFIG_INVALID'
  | 'DB_CONN_FAILED'
  | 'SCHEMA_FAILED'
  | 'RUN_FAILED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'run';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'DB_CONN_FAILED', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

/** A question run that ended without an answer. */
export function runFailedError(message: string, details?: unknown): CliError {
  return new CliError('run', 'RUN_FAILED', message, details);
}

/** Lift pipeline errors into CLI errors; everything else passes through. */
export function toCliError(error: unknown): unknown {
  if (error instanceof CliError || !isPipelineError(error)) return error;
  switch (error.code) {
    case 'CONFIG_ERROR':
      return usageError(error.message, 'CONFIG_INVALID', error.details);
    case 'CONNECTION_ERROR':
      return runtimeError(error.message, 'DB_CONN_FAILED', error.details);
    case 'SCHEMA_RESOLUTION_ERROR':
      return runtimeError(error.message, 'SCHEMA_FAILED', error.details);
    default:
      return runFailedError(error.message, { code: error.code, details: error.details });
  }
}

export function toExitCode(error: unknown): number {
  const lifted = toCliError(error);
  if (lifted instanceof CliError) {
    if (lifted.kind === 'usage') return EXIT_CODE_USAGE;
    if (lifted.kind === 'run') return EXIT_CODE_RUN_FAILED;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}
