/**
 * Text completion capability consumed by the pipeline.
 * Implementations own their transient-failure retry policy.
 */

export type CompletionStage = 'generation' | 'repair' | 'validation' | 'answer';

export interface CompletionContext {
  stage: CompletionStage;
  /** Overrides the implementation's default system message */
  system?: string;
  /** Ask for a JSON object response where the backend supports it */
  json?: boolean;
}

export interface TextCompletion {
  readonly model: string;
  complete(prompt: string, context: CompletionContext): Promise<string>;
}
