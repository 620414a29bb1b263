/**
 * Schema resolution: which tables a question needs, rendered as the
 * grounding text for generation. Computed fresh for every question.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { DbConnection, Row, TableSchema } from '../db/types.js';
import {
  connectionError,
  errorMessage,
  isPipelineError,
  schemaResolutionError,
  withTimeout,
} from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { renderCreateTable, renderTableBlock } from './ddl.js';
import type { CorpusDocument, TableSearch } from './search.js';

export interface SchemaSnapshot {
  dialect: string;
  allTables: string[];
  /** Always a subset of allTables, in allTables order */
  relevantTables: string[];
  formattedSchema: string;
  perTableInfo: Record<string, TableSchema>;
  /** True when table search failed or matched nothing and every table was used */
  usedFallback: boolean;
}

export interface SchemaResolverOptions {
  search: TableSearch;
  topK?: number;
  sampleRows?: number;
  /** Bound on each database or search call */
  timeoutMs?: number;
  logger?: Logger;
}

export class SchemaResolver {
  private readonly search: TableSearch;
  private readonly topK: number;
  private readonly sampleRowCount: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: SchemaResolverOptions) {
    this.search = options.search;
    this.topK = options.topK ?? 5;
    this.sampleRowCount = options.sampleRows ?? SAFE_DEFAULTS.sampleRows;
    this.timeoutMs = options.timeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs;
    this.logger = options.logger ?? createLogger('schema-resolver');
  }

  async allTables(conn: DbConnection): Promise<string[]> {
    if (!conn.isConnected()) {
      throw connectionError(`Connection to ${conn.dialect} database ${conn.database} is not live.`);
    }
    try {
      return await withTimeout(conn.listTables(), this.timeoutMs, 'Listing tables');
    } catch (err: unknown) {
      throw connectionError(`Could not enumerate tables: ${errorMessage(err)}`);
    }
  }

  async relevantTables(question: string, allTables: string[], topK: number, corpusId: string): Promise<string[]> {
    return (await this.selectTables(question, allTables, topK, corpusId)).tables;
  }

  /**
   * Renders each table in input order. A table whose sample rows cannot be
   * read is still rendered, with no rows.
   */
  async format(conn: DbConnection, tables: string[]): Promise<string> {
    const schemas = await this.describeAll(conn, tables);
    return this.render(conn, tables, schemas);
  }

  async resolve(conn: DbConnection, question: string, corpusId: string): Promise<SchemaSnapshot> {
    const allTables = await this.allTables(conn);
    try {
      const { tables, fallback } = await this.selectTables(question, allTables, this.topK, corpusId);
      const perTableInfo = await this.describeAll(conn, tables);
      const formattedSchema = await this.render(conn, tables, perTableInfo);
      return {
        dialect: conn.dialect,
        allTables,
        relevantTables: tables,
        formattedSchema,
        perTableInfo,
        usedFallback: fallback,
      };
    } catch (err: unknown) {
      if (isPipelineError(err)) throw err;
      throw schemaResolutionError(`Schema resolution failed: ${errorMessage(err)}`);
    }
  }

  /** One search document per table: its name, columns and CREATE statement. */
  async corpus(conn: DbConnection): Promise<CorpusDocument[]> {
    const tables = await this.allTables(conn);
    const schemas = await this.describeAll(conn, tables);
    return tables.map((table) => ({
      table,
      columns: schemas[table].columns.map((c) => c.name),
      text: `Table ${table}\n${renderCreateTable(schemas[table])}`,
    }));
  }

  async indexSession(conn: DbConnection, corpusId: string): Promise<number> {
    const docs = await this.corpus(conn);
    await withTimeout(this.search.index(corpusId, docs), this.timeoutMs, 'Indexing table corpus');
    this.logger.info({ corpusId, tables: docs.length }, 'table corpus indexed');
    return docs.length;
  }

  async dropSession(corpusId: string): Promise<void> {
    await this.search.drop(corpusId);
  }

  // ── internals ──────────────────────────────────────────────────────

  private async selectTables(
    question: string,
    allTables: string[],
    topK: number,
    corpusId: string,
  ): Promise<{ tables: string[]; fallback: boolean }> {
    let hits: string[];
    try {
      hits = await withTimeout(this.search.topK(question, topK, corpusId), this.timeoutMs, 'Table search');
    } catch (err: unknown) {
      this.logger.warn({ corpusId, err }, 'table search failed, using all tables');
      return { tables: [...allTables], fallback: true };
    }

    const wanted = new Set(hits.map((name) => name.toLowerCase()));
    const tables = allTables.filter((table) => wanted.has(table.toLowerCase()));
    if (tables.length === 0) {
      this.logger.info({ corpusId, hits: hits.length }, 'table search matched nothing, using all tables');
      return { tables: [...allTables], fallback: true };
    }
    return { tables: Array.from(new Set(tables)), fallback: false };
  }

  private async describeAll(conn: DbConnection, tables: string[]): Promise<Record<string, TableSchema>> {
    const schemas: Record<string, TableSchema> = {};
    for (const table of tables) {
      schemas[table] = await withTimeout(conn.describeTable(table), this.timeoutMs, `Describing ${table}`);
    }
    return schemas;
  }

  private async samples(conn: DbConnection, table: string): Promise<Row[]> {
    try {
      return await withTimeout(conn.sampleRows(table, this.sampleRowCount), this.timeoutMs, `Sampling ${table}`);
    } catch (err: unknown) {
      this.logger.warn({ table, err }, 'could not read sample rows');
      return [];
    }
  }

  private async render(conn: DbConnection, tables: string[], schemas: Record<string, TableSchema>): Promise<string> {
    const blocks: string[] = [];
    for (const table of tables) {
      const rows = (await this.samples(conn, table)).slice(0, this.sampleRowCount);
      blocks.push(renderTableBlock(schemas[table], rows));
    }
    return blocks.join('\n\n');
  }
}
