/**
 * Pre-execution query validation: static checks plus a model opinion.
 * The result is advisory. The orchestrator decides what to do with it.
 */

import { errorMessage, withTimeout } from '../errors.js';
import type { TextCompletion } from '../llm/completion.js';
import { affirmsValidity, extractCorrection } from '../llm/extract.js';
import { buildValidationPrompt } from '../llm/prompt.js';
import { createLogger, type Logger } from '../logger.js';
import type { SchemaSnapshot } from '../schema/resolver.js';
import { runChecks, type ValidationIssue } from './heuristics.js';

export interface ValidationResult {
  isValid: boolean;
  issues: string[];
  findings: ValidationIssue[];
  /** Present only when the query is invalid and the opinion carried a fix */
  correctedSql?: string;
  opinionAffirmed: boolean;
  opinion?: string;
}

export interface QueryValidatorOptions {
  completion: TextCompletion;
  timeoutMs?: number;
  logger?: Logger;
}

function sameQuery(a: string, b: string): boolean {
  const norm = (s: string): string => s.replace(/;+\s*$/, '').replace(/\s+/g, ' ').trim().toLowerCase();
  return norm(a) === norm(b);
}

export class QueryValidator {
  private readonly completion: TextCompletion;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: QueryValidatorOptions) {
    this.completion = options.completion;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.logger = options.logger ?? createLogger('query-validator');
  }

  /**
   * Every check runs; findings are unioned. A failed opinion call counts
   * as no affirmation.
   */
  async validate(sql: string, schema: SchemaSnapshot, dialect: string): Promise<ValidationResult> {
    const findings = runChecks(sql, schema.allTables, dialect);

    let opinion: string | undefined;
    try {
      opinion = await withTimeout(
        this.completion.complete(buildValidationPrompt({ dialect, schema: schema.formattedSchema, sql }), {
          stage: 'validation',
        }),
        this.timeoutMs,
        'Validation opinion',
      );
    } catch (err: unknown) {
      this.logger.warn({ error: errorMessage(err) }, 'validation opinion unavailable');
    }

    const opinionAffirmed = opinion !== undefined && affirmsValidity(opinion);
    const isValid = findings.length === 0 && opinionAffirmed;
    // an affirming opinion carries no correction, whatever SQL it quotes
    const extracted = !opinionAffirmed && opinion !== undefined ? extractCorrection(opinion) : undefined;
    // an opinion that only echoes the query offers no correction
    const correctedSql = extracted !== undefined && sameQuery(extracted, sql) ? undefined : extracted;

    this.logger.debug(
      { issues: findings.length, opinionAffirmed, corrected: correctedSql !== undefined },
      'query validated',
    );

    return {
      isValid,
      issues: findings.map((f) => f.message),
      findings,
      ...(correctedSql !== undefined ? { correctedSql } : {}),
      opinionAffirmed,
      ...(opinion !== undefined ? { opinion } : {}),
    };
  }
}

/** Findings that make a query not worth sending to the database. */
export function blockingIssues(result: ValidationResult): string[] {
  return result.findings.filter((f) => f.severity === 'error').map((f) => f.message);
}
