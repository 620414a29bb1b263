/**
 * Composition root for the question pipeline.
 * Wires configuration into the registry, schema resolver, validator and
 * orchestrator that the server and the CLI share.
 */

import { Orchestrator } from './agent/orchestrator.js';
import type { AppConfig } from './config.js';
import { connector, type ConnectFn } from './db/connect.js';
import type { TextCompletion } from './llm/completion.js';
import { OpenAIProvider, lazyOpenAIClient, openAIEmbedder } from './llm/openai.js';
import type { Logger } from './logger.js';
import { SchemaResolver } from './schema/resolver.js';
import { EmbeddingTableSearch, KeywordTableSearch, type TableSearch } from './schema/search.js';
import { SessionRegistry } from './session/registry.js';
import { QueryValidator } from './validation/validator.js';

export interface Pipeline {
  registry: SessionRegistry;
  resolver: SchemaResolver;
  validator: QueryValidator;
  orchestrator: Orchestrator;
  connect: ConnectFn;
}

/** Replacements for the capabilities that reach outside the process. */
export interface PipelineOverrides {
  completion?: TextCompletion;
  search?: TableSearch;
  connect?: ConnectFn;
  logger?: Logger;
}

function tableSearch(config: AppConfig): TableSearch {
  if (config.tableSearch === 'keyword') return new KeywordTableSearch();
  const client = lazyOpenAIClient({
    apiKey: config.openaiApiKey,
    timeoutMs: config.llmTimeoutMs,
    maxRetries: config.llmMaxRetries,
  });
  return new EmbeddingTableSearch(openAIEmbedder(client, config.embeddingModel));
}

export function createPipeline(config: AppConfig, overrides: PipelineOverrides = {}): Pipeline {
  const logger = overrides.logger;
  const completion =
    overrides.completion ??
    new OpenAIProvider({
      apiKey: config.openaiApiKey,
      model: config.model,
      temperature: config.temperature,
      timeoutMs: config.llmTimeoutMs,
      maxRetries: config.llmMaxRetries,
    });

  const resolver = new SchemaResolver({
    search: overrides.search ?? tableSearch(config),
    topK: config.topKTables,
    timeoutMs: config.dbTimeoutMs,
    logger,
  });
  const validator = new QueryValidator({ completion, timeoutMs: config.llmTimeoutMs, logger });
  const orchestrator = new Orchestrator({
    resolver,
    validator,
    completion,
    maxRetries: config.maxRetries,
    llmTimeoutMs: config.llmTimeoutMs,
    dbTimeoutMs: config.dbTimeoutMs,
    logger,
  });

  return {
    registry: new SessionRegistry({ logger }),
    resolver,
    validator,
    orchestrator,
    connect: overrides.connect ?? connector({ statementTimeoutMs: config.dbTimeoutMs }),
  };
}
