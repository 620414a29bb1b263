/**
 * @tabletalk/core barrel export
 *
 * Question pipeline shared by the HTTP server and the CLI.
 */

// Errors, config, logging
export {
  PipelineError,
  TimeoutError,
  configError,
  connectionError,
  errorMessage,
  executionError,
  generationError,
  isPipelineError,
  orchestrationError,
  registryConflict,
  schemaResolutionError,
  sessionNotFound,
  withTimeout,
} from './errors.js';
export type { PipelineErrorCode } from './errors.js';
export { loadConfig, DEFAULT_MODEL, DEFAULT_EMBEDDING_MODEL } from './config.js';
export type { AppConfig, TableSearchKind } from './config.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';

// Database types and adapters
export type {
  DbType,
  ConnectionParams,
  ColumnInfo,
  ForeignKeyInfo,
  IndexInfo,
  TableSchema,
  Row,
  ExecutionOutcome,
  ExecuteLimits,
  DbConnection,
} from './db/types.js';
export { SAFE_DEFAULTS } from './db/defaults.js';
export { SUPPORTED_DB_TYPES, isSupported, openConnection, connector } from './db/connect.js';
export type { ConnectFn, ConnectOptions } from './db/connect.js';

// Sessions
export { SessionRegistry } from './session/registry.js';
export type { Session, SessionRegistryOptions } from './session/registry.js';

// Dialects
export { featureSet, describeFeatures, normalizeDialect, isKnownDialect } from './dialect/catalog.js';
export type { FeatureSet, KnownDialect } from './dialect/catalog.js';
export { adapt, adaptWithTrace, rulesFor } from './dialect/adapt.js';
export type { AdaptResult, RewriteRule } from './dialect/adapt.js';

// Schema resolution
export { SchemaResolver } from './schema/resolver.js';
export type { SchemaSnapshot, SchemaResolverOptions } from './schema/resolver.js';
export { KeywordTableSearch, EmbeddingTableSearch, UnknownCorpusError } from './schema/search.js';
export type { TableSearch, CorpusDocument, EmbedFn } from './schema/search.js';
export { renderCreateTable, renderTableBlock } from './schema/ddl.js';

// LLM
export { OpenAIProvider, createOpenAIClient, getApiKey, lazyOpenAIClient, openAIEmbedder } from './llm/openai.js';
export type { OpenAIProviderOptions } from './llm/openai.js';
export type { TextCompletion, CompletionContext, CompletionStage } from './llm/completion.js';
export { extractSql, extractCorrection, affirmsValidity } from './llm/extract.js';
export type { FinalAnswer } from './llm/answer.js';

// Validation
export { QueryValidator, blockingIssues } from './validation/validator.js';
export type { ValidationResult, QueryValidatorOptions } from './validation/validator.js';
export type { ValidationIssue } from './validation/heuristics.js';

// Orchestration
export { Orchestrator, DEFAULT_MAX_RETRIES, describeOutcome } from './agent/orchestrator.js';
export type { OrchestratorOptions, RunOptions } from './agent/orchestrator.js';
export type { AgentState, AgentError, ExecutionResult, GeneratedQuery, Stage, TurnMessage } from './agent/state.js';

// Composition
export { createPipeline } from './pipeline.js';
export type { Pipeline, PipelineOverrides } from './pipeline.js';
