/**
 * Provider Interfaces
 *
 * The hosted model is an opaque text-completion function and an opaque
 * text -> vector function. Tests substitute fakes for both.
 */

import type { EmbeddingVector } from '../types';

/**
 * JSON schema handed to the model as a structured-output contract.
 */
export interface StructuredOutputSchema {
  name: string;
  schema: Record<string, unknown>;
}

export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  responseSchema?: StructuredOutputSchema;
  maxTokens?: number;
}

export interface CompletionClient {
  readonly model: string;
  /** Raw text content of the first choice */
  complete(request: CompletionRequest): Promise<string>;
}

export interface EmbeddingProvider {
  readonly model: string;
  /** One vector per input, in input order */
  embed(texts: string[]): Promise<EmbeddingVector[]>;
}
