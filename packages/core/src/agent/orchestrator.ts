/**
 * Question orchestration: a state machine over one AgentState.
 *
 *   idle → schema_resolved → query_generated → query_validated → executed → answered
 *                                  ↑                                  │
 *                                  └──── execution failed, retry ─────┘
 *
 * Every non-terminal stage has a handler that returns its successor
 * explicitly; a successor outside TRANSITIONS ends the run in `error`.
 * `run` never throws.
 */

import { adaptWithTrace } from '../dialect/adapt.js';
import type { DbConnection, ExecutionOutcome } from '../db/types.js';
import {
  errorMessage,
  executionError,
  generationError,
  isPipelineError,
  orchestrationError,
  type PipelineErrorCode,
  withTimeout,
} from '../errors.js';
import { parseAnswer } from '../llm/answer.js';
import type { TextCompletion } from '../llm/completion.js';
import { extractExplanation, extractSql } from '../llm/extract.js';
import { buildAnswerPrompt, buildFixerPrompt, buildGenerationPrompt } from '../llm/prompt.js';
import { createLogger, type Logger } from '../logger.js';
import type { SchemaResolver } from '../schema/resolver.js';
import { blockingIssues, type QueryValidator, type ValidationResult } from '../validation/validator.js';
import {
  initialState,
  isTerminal,
  type AgentState,
  type GeneratedQuery,
  type Stage,
  type TerminalStage,
} from './state.js';

export const DEFAULT_MAX_RETRIES = 3;

const TRANSITIONS: Record<Exclude<Stage, TerminalStage>, readonly Stage[]> = {
  idle: ['schema_resolved', 'error'],
  schema_resolved: ['query_generated', 'error'],
  query_generated: ['query_validated', 'error'],
  query_validated: ['executed', 'error'],
  executed: ['query_generated', 'answered', 'error'],
};

export interface OrchestratorOptions {
  resolver: SchemaResolver;
  validator: QueryValidator;
  completion: TextCompletion;
  maxRetries?: number;
  /** Bound on each completion call; 0 disables */
  llmTimeoutMs?: number;
  /** Bound on each query execution; 0 disables */
  dbTimeoutMs?: number;
  logger?: Logger;
}

export interface RunOptions {
  /** Table-search corpus of the session */
  corpusId: string;
}

interface RunContext {
  conn: DbConnection;
  corpusId: string;
}

type StageHandler = (state: AgentState, ctx: RunContext) => Promise<Stage>;

export class Orchestrator {
  readonly maxRetries: number;
  private readonly resolver: SchemaResolver;
  private readonly validator: QueryValidator;
  private readonly completion: TextCompletion;
  private readonly llmTimeoutMs: number;
  private readonly dbTimeoutMs: number;
  private readonly logger: Logger;
  private readonly handlers: Record<Exclude<Stage, TerminalStage>, StageHandler>;

  constructor(options: OrchestratorOptions) {
    this.resolver = options.resolver;
    this.validator = options.validator;
    this.completion = options.completion;
    this.maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.llmTimeoutMs = options.llmTimeoutMs ?? 0;
    this.dbTimeoutMs = options.dbTimeoutMs ?? 0;
    this.logger = options.logger ?? createLogger('orchestrator');
    this.handlers = {
      idle: (state, ctx) => this.resolveSchema(state, ctx),
      schema_resolved: (state) => this.generate(state),
      query_generated: (state) => this.validate(state),
      query_validated: (state, ctx) => this.execute(state, ctx),
      executed: (state) => this.afterExecution(state),
    };
  }

  /** Upper bound on handler calls: one pass plus three steps per retry, with slack. */
  get maxSteps(): number {
    return 5 + 3 * (this.maxRetries + 1);
  }

  async run(question: string, conn: DbConnection, options: RunOptions): Promise<AgentState> {
    const state = initialState(question, conn.dialect);
    const ctx: RunContext = { conn, corpusId: options.corpusId };
    const started = Date.now();

    let steps = 0;
    while (!isTerminal(state.stage)) {
      const current = state.stage;
      if (steps++ >= this.maxSteps) {
        state.stage = this.fail(state, orchestrationError(`Run did not finish within ${this.maxSteps} steps.`));
        break;
      }

      let next: Stage;
      try {
        next = await this.handlers[current](state, ctx);
      } catch (err: unknown) {
        // handlers encode their own failures; anything here is a defect
        state.stage = this.fail(state, orchestrationError(`Stage ${current} failed unexpectedly: ${errorMessage(err)}`));
        break;
      }

      if (!TRANSITIONS[current].includes(next)) {
        state.stage = this.fail(state, orchestrationError(`No transition from ${current} to ${next}.`));
        break;
      }
      this.logger.debug({ from: current, to: next, retryCount: state.retryCount }, 'stage transition');
      state.stage = next;
    }

    this.logger.info(
      {
        stage: state.stage,
        attempts: state.attempts,
        retryCount: state.retryCount,
        durationMs: Date.now() - started,
        ...(state.error ? { errorCode: state.error.code } : {}),
      },
      'run finished',
    );
    return state;
  }

  // ── Stage handlers ─────────────────────────────────────────────────

  private async resolveSchema(state: AgentState, ctx: RunContext): Promise<Stage> {
    if (!state.question.trim()) {
      return this.fail(state, orchestrationError('No question to answer.'));
    }
    try {
      const snapshot = await this.resolver.resolve(ctx.conn, state.question, ctx.corpusId);
      state.schemaSnapshot = snapshot;
      this.say(
        state,
        `Using ${snapshot.relevantTables.length} of ${snapshot.allTables.length} tables: ${snapshot.relevantTables.join(', ')}`,
      );
      return 'schema_resolved';
    } catch (err: unknown) {
      return this.fail(state, err, 'SCHEMA_RESOLUTION_ERROR');
    }
  }

  private async generate(state: AgentState): Promise<Stage> {
    const snapshot = state.schemaSnapshot;
    if (!snapshot) return this.fail(state, orchestrationError('Generation needs a resolved schema.'));

    const prompt = buildGenerationPrompt({
      dialect: state.dialect,
      question: state.question,
      schema: snapshot.formattedSchema,
      tables: snapshot.relevantTables,
    });
    try {
      state.generatedQuery = await this.completeQuery(prompt, 'generation');
      this.say(state, `Generated SQL:\n${state.generatedQuery.sql}`);
      return 'query_generated';
    } catch (err: unknown) {
      return this.fail(state, err, 'GENERATION_ERROR');
    }
  }

  private async validate(state: AgentState): Promise<Stage> {
    const query = state.generatedQuery;
    const snapshot = state.schemaSnapshot;
    if (!query || !snapshot) return this.fail(state, orchestrationError('Validation needs a generated query.'));

    state.rejection = undefined;
    let result: ValidationResult;
    try {
      result = await this.validator.validate(query.sql, snapshot, state.dialect);
    } catch (err: unknown) {
      // advisory only
      this.logger.warn({ error: errorMessage(err) }, 'validation failed, executing unvalidated query');
      state.validationResult = undefined;
      return 'query_validated';
    }
    state.validationResult = result;

    if (result.isValid) {
      this.say(state, 'Query passed validation.');
      return 'query_validated';
    }

    if (result.correctedSql !== undefined && !state.correctionApplied) {
      query.sql = result.correctedSql;
      state.correctionApplied = true;
      this.say(state, `Validation corrected the query:\n${query.sql}`);
      return 'query_validated';
    }

    const blocking = blockingIssues(result);
    if (blocking.length > 0) {
      state.rejection = blocking.join(' ');
      this.say(state, `Query rejected before execution: ${state.rejection}`);
    } else {
      this.say(state, `Validation notes: ${result.issues.join(' ')}`);
    }
    return 'query_validated';
  }

  private async execute(state: AgentState, ctx: RunContext): Promise<Stage> {
    const query = state.generatedQuery;
    if (!query) return this.fail(state, orchestrationError('Execution needs a generated query.'));

    state.attempts++;
    if (state.rejection !== undefined) {
      state.executionResult = { success: false, sql: query.sql, errorMessage: state.rejection };
      return 'executed';
    }

    const adapted = adaptWithTrace(query.sql, state.dialect);
    if (adapted.applied.length > 0) {
      this.logger.debug({ dialect: state.dialect, rules: adapted.applied }, 'query adapted');
    }

    try {
      const outcome = await withTimeout(ctx.conn.execute(adapted.sql), this.dbTimeoutMs, 'Query execution');
      state.executionResult = { success: true, sql: adapted.sql, outcome };
      this.say(state, describeOutcome(outcome));
    } catch (err: unknown) {
      const message = errorMessage(err);
      state.executionResult = { success: false, sql: adapted.sql, errorMessage: message };
      this.logger.warn({ attempt: state.attempts, error: message }, 'query execution failed');
      this.say(state, `Execution failed: ${message}`);
    }
    return 'executed';
  }

  private async afterExecution(state: AgentState): Promise<Stage> {
    const result = state.executionResult;
    if (!result) return this.fail(state, orchestrationError('No execution result to act on.'));

    if (result.success) {
      return this.answer(state, result.sql, result.outcome);
    }

    if (state.retryCount >= this.maxRetries) {
      return this.fail(
        state,
        executionError(`Query failed after ${state.attempts} attempt(s): ${result.errorMessage}`),
      );
    }

    state.retryCount++;
    this.logger.info({ retryCount: state.retryCount, maxRetries: this.maxRetries }, 'regenerating after failure');
    return this.regenerate(state, result.sql, result.errorMessage);
  }

  private async regenerate(state: AgentState, previousSql: string, error: string): Promise<Stage> {
    const snapshot = state.schemaSnapshot;
    if (!snapshot) return this.fail(state, orchestrationError('Regeneration needs a resolved schema.'));

    const prompt = buildFixerPrompt({
      dialect: state.dialect,
      question: state.question,
      schema: snapshot.formattedSchema,
      tables: snapshot.relevantTables,
      previousSql,
      error,
    });
    try {
      state.generatedQuery = await this.completeQuery(prompt, 'repair');
      this.say(state, `Retry ${state.retryCount}, regenerated SQL:\n${state.generatedQuery.sql}`);
      return 'query_generated';
    } catch (err: unknown) {
      return this.fail(state, err, 'GENERATION_ERROR');
    }
  }

  private async answer(state: AgentState, sql: string, outcome: ExecutionOutcome): Promise<Stage> {
    try {
      const raw = await withTimeout(
        this.completion.complete(buildAnswerPrompt({ question: state.question, sql, outcome }), {
          stage: 'answer',
          json: true,
        }),
        this.llmTimeoutMs,
        'Answer synthesis',
      );
      state.finalAnswer = parseAnswer(raw, describeOutcome(outcome));
      this.say(state, state.finalAnswer.answer || 'Answered with a chart.');
      return 'answered';
    } catch (err: unknown) {
      return this.fail(state, err, 'GENERATION_ERROR');
    }
  }

  // ── helpers ────────────────────────────────────────────────────────

  private async completeQuery(prompt: string, stage: 'generation' | 'repair'): Promise<GeneratedQuery> {
    const raw = await withTimeout(this.completion.complete(prompt, { stage }), this.llmTimeoutMs, `SQL ${stage}`);
    const sql = extractSql(raw);
    if (!sql) {
      throw generationError('The model returned no SQL.');
    }
    return { sql, explanation: extractExplanation(raw), rawModelOutput: raw };
  }

  private say(state: AgentState, content: string): void {
    state.messages.push({ role: 'assistant', stage: state.stage, content });
  }

  /**
   * Record a fatal error on the state and return `error`. Pipeline errors
   * keep their own code; anything else takes `fallback`.
   */
  private fail(state: AgentState, err: unknown, fallback: PipelineErrorCode = 'ORCHESTRATION_ERROR'): Stage {
    const code = isPipelineError(err) ? err.code : fallback;
    const message = errorMessage(err);
    state.error = { code, stage: state.stage, message };
    this.say(state, `Error: ${message}`);
    this.logger.error({ code, stage: state.stage, retryCount: state.retryCount }, message);
    return 'error';
  }
}

export function describeOutcome(outcome: ExecutionOutcome): string {
  if (outcome.kind === 'affected') {
    return `Statement affected ${outcome.affectedRowCount} row(s).`;
  }
  const suffix = outcome.truncated ? ` (showing the first ${outcome.rows.length})` : '';
  return `Query returned ${outcome.rowCount} row(s)${suffix}.`;
}
