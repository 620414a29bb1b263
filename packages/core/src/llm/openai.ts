/**
 * OpenAI-backed text completion and embeddings.
 * The SDK's own retry and timeout options are the stage-level retry policy
 * for transient failures.
 */

import OpenAI from 'openai';
import { DEFAULT_EMBEDDING_MODEL, DEFAULT_MODEL } from '../config.js';
import { configError, generationError } from '../errors.js';
import type { EmbedFn } from '../schema/search.js';
import type { CompletionContext, TextCompletion } from './completion.js';

const DEFAULT_SYSTEM = 'You are an expert SQL analyst. Follow the requested output format exactly.';

export interface OpenAIProviderOptions {
  apiKey?: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
  maxRetries?: number;
  maxTokens?: number;
  /** Injected client, mostly for tests */
  client?: OpenAI;
}

export function getApiKey(explicit?: string): string {
  const key = explicit ?? process.env.OPENAI_API_KEY;
  if (!key) {
    throw configError('OpenAI API key is not configured. Set OPENAI_API_KEY in your environment.');
  }
  return key;
}

export function createOpenAIClient(options: OpenAIProviderOptions = {}): OpenAI {
  return (
    options.client ??
    new OpenAI({
      apiKey: getApiKey(options.apiKey),
      timeout: options.timeoutMs,
      maxRetries: options.maxRetries ?? 2,
    })
  );
}

/** Defers client creation, and with it the API key check, to the first call. */
export function lazyOpenAIClient(options: OpenAIProviderOptions = {}): () => OpenAI {
  let client = options.client;
  return () => {
    if (!client) client = createOpenAIClient(options);
    return client;
  };
}

export class OpenAIProvider implements TextCompletion {
  readonly model: string;
  private readonly client: () => OpenAI;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: OpenAIProviderOptions = {}) {
    this.client = lazyOpenAIClient(options);
    this.model = options.model ?? DEFAULT_MODEL;
    this.temperature = options.temperature ?? 0.1;
    this.maxTokens = options.maxTokens ?? 2048;
  }

  async complete(prompt: string, context: CompletionContext): Promise<string> {
    const response = await this.client().chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: context.system ?? DEFAULT_SYSTEM },
        { role: 'user', content: prompt },
      ],
      temperature: this.temperature,
      max_tokens: this.maxTokens,
      ...(context.json ? { response_format: { type: 'json_object' as const } } : {}),
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw generationError(`OpenAI returned an empty response during ${context.stage}.`);
    }
    return content;
  }
}

export function openAIEmbedder(client: () => OpenAI, model = DEFAULT_EMBEDDING_MODEL): EmbedFn {
  return async (texts) => {
    const response = await client().embeddings.create({ model, input: texts });
    return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  };
}
