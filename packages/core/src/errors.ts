/**
 * Error taxonomy for the question pipeline.
 * Every fatal condition a run can hit carries one of these codes.
 */

export type PipelineErrorCode =
  | 'CONNECTION_ERROR'
  | 'SCHEMA_RESOLUTION_ERROR'
  | 'GENERATION_ERROR'
  | 'EXECUTION_ERROR'
  | 'REGISTRY_CONFLICT'
  | 'SESSION_NOT_FOUND'
  | 'CONFIG_ERROR'
  | 'ORCHESTRATION_ERROR';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly details?: unknown;

  constructor(code: PipelineErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;
  }
}

export function connectionError(message: string, details?: unknown): PipelineError {
  return new PipelineError('CONNECTION_ERROR', message, details);
}

export function schemaResolutionError(message: string, details?: unknown): PipelineError {
  return new PipelineError('SCHEMA_RESOLUTION_ERROR', message, details);
}

export function generationError(message: string, details?: unknown): PipelineError {
  return new PipelineError('GENERATION_ERROR', message, details);
}

export function executionError(message: string, details?: unknown): PipelineError {
  return new PipelineError('EXECUTION_ERROR', message, details);
}

export function registryConflict(sessionId: string): PipelineError {
  return new PipelineError(
    'REGISTRY_CONFLICT',
    `Session "${sessionId}" already has a live connection. Disconnect it first.`,
  );
}

export function sessionNotFound(sessionId: string): PipelineError {
  return new PipelineError('SESSION_NOT_FOUND', `No live session found for id "${sessionId}".`);
}

export function configError(message: string): PipelineError {
  return new PipelineError('CONFIG_ERROR', message);
}

export function orchestrationError(message: string, details?: unknown): PipelineError {
  return new PipelineError('ORCHESTRATION_ERROR', message, details);
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Race a promise against a timer. The timer is always cleared, and a
 * non-positive timeout disables the bound.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (!(timeoutMs > 0)) return promise;
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
