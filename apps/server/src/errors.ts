import { isPipelineError, type AgentState, type PipelineErrorCode } from '@tabletalk/core';

export interface ErrorPayload {
  status: 'FAILED';
  status_code: number;
  error: string;
  message: string;
  stage?: string;
}

/** An error that already knows its HTTP status and response body. */
export class AppError extends Error {
  readonly statusCode: number;
  readonly payload: ErrorPayload;

  constructor(statusCode: number, code: string, message: string, stage?: string) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.payload = {
      status: 'FAILED',
      status_code: statusCode,
      error: code,
      message,
      ...(stage ? { stage } : {}),
    };
  }
}

const STATUS_BY_CODE: Partial<Record<PipelineErrorCode, number>> = {
  REGISTRY_CONFLICT: 400,
  SESSION_NOT_FOUND: 400,
  CONNECTION_ERROR: 502,
};

/** Client errors Fastify raises itself (body validation, content type, size). */
export function badRequest(message: string, statusCode = 400): AppError {
  return new AppError(statusCode, 'BAD_REQUEST', message);
}

/** Map a thrown value to an AppError, or undefined when it is not one we expect. */
export function toAppError(error: unknown): AppError | undefined {
  if (error instanceof AppError) return error;
  if (isPipelineError(error)) {
    return new AppError(STATUS_BY_CODE[error.code] ?? 500, error.code, error.message);
  }
  return undefined;
}

/** A run that ended in `error` is reported as 422 with its code and stage. */
export function runFailed(state: AgentState): AppError {
  const code = state.error?.code ?? 'ORCHESTRATION_ERROR';
  const message = state.error?.message ?? 'The question could not be answered.';
  return new AppError(422, code, message, state.error?.stage);
}
