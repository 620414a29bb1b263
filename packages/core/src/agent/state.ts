/**
 * Per-run agent state. One record per question; never shared between runs.
 */

import type { ExecutionOutcome } from '../db/types.js';
import type { PipelineErrorCode } from '../errors.js';
import type { FinalAnswer } from '../llm/answer.js';
import type { SchemaSnapshot } from '../schema/resolver.js';
import type { ValidationResult } from '../validation/validator.js';

export type Stage =
  | 'idle'
  | 'schema_resolved'
  | 'query_generated'
  | 'query_validated'
  | 'executed'
  | 'answered'
  | 'error';

export type TerminalStage = 'answered' | 'error';

export function isTerminal(stage: Stage): stage is TerminalStage {
  return stage === 'answered' || stage === 'error';
}

export interface TurnMessage {
  role: 'user' | 'assistant';
  stage: Stage;
  content: string;
}

export interface GeneratedQuery {
  sql: string;
  explanation: string;
  rawModelOutput: string;
}

export type ExecutionResult =
  | { success: true; sql: string; outcome: ExecutionOutcome }
  | { success: false; sql: string; errorMessage: string };

export interface AgentError {
  code: PipelineErrorCode;
  /** Stage the run was leaving when it failed */
  stage: Stage;
  message: string;
}

export interface AgentState {
  question: string;
  dialect: string;
  stage: Stage;
  messages: TurnMessage[];
  schemaSnapshot?: SchemaSnapshot;
  generatedQuery?: GeneratedQuery;
  validationResult?: ValidationResult;
  /** Set by validation when the query should not reach the database */
  rejection?: string;
  executionResult?: ExecutionResult;
  finalAnswer?: FinalAnswer;
  error?: AgentError;
  /** Back-edge traversals so far; persists across regenerations */
  retryCount: number;
  /** Execution attempts, including queries rejected before reaching the database */
  attempts: number;
  correctionApplied: boolean;
}

export function initialState(question: string, dialect: string): AgentState {
  return {
    question,
    dialect,
    stage: 'idle',
    messages: [{ role: 'user', stage: 'idle', content: question }],
    retryCount: 0,
    attempts: 0,
    correctionApplied: false,
  };
}
