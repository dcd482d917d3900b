/**
 * OpenAI Integration
 *
 * Chat completions (structured outputs) for field extraction and the
 * embeddings endpoint for HS classification and history search.
 * The SDK's own retries are disabled: a failed call goes straight to the
 * caller's fallback arm.
 */

import OpenAI from 'openai';
import { isAiConfigured, type Config } from '../config';
import { ProviderUnavailableError, errorMessage } from '../errors';
import { logger } from '../logger';
import {
  llmRequestsCounter,
  llmRequestDurationHistogram,
  embeddingRequestsCounter,
  embeddingRequestDurationHistogram,
} from '../metrics';
import type { EmbeddingVector } from '../types';
import type { CompletionClient, CompletionRequest, EmbeddingProvider } from './types';

/** Inputs per embeddings request */
const EMBEDDING_BATCH_SIZE = 256;

export class OpenAiCompletionClient implements CompletionClient {
  readonly model: string;

  constructor(private readonly openai: OpenAI, model: string) {
    this.model = model;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.userPrompt },
        ],
        response_format: request.responseSchema
          ? {
              type: 'json_schema',
              json_schema: {
                name: request.responseSchema.name,
                strict: true,
                schema: request.responseSchema.schema,
              },
            }
          : undefined,
        max_tokens: request.maxTokens,
        temperature: 0,
      });

      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: this.model }, duration);
      llmRequestsCounter.inc({ model: this.model, status: 'success' });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new ProviderUnavailableError('openai', 'Empty completion response from OpenAI');
      }

      logger.info('OpenAI completion complete', {
        model: this.model,
        request_id: response.id,
        duration_seconds: duration,
        tokens_used: response.usage?.total_tokens,
      });

      return content;
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: this.model }, duration);
      llmRequestsCounter.inc({ model: this.model, status: 'error' });

      if (error instanceof ProviderUnavailableError) {
        throw error;
      }
      throw new ProviderUnavailableError('openai', `OpenAI completion failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;

  constructor(private readonly openai: OpenAI, model: string) {
    this.model = model;
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    const vectors: EmbeddingVector[] = [];

    for (let offset = 0; offset < texts.length; offset += EMBEDDING_BATCH_SIZE) {
      const batch = texts.slice(offset, offset + EMBEDDING_BATCH_SIZE);
      vectors.push(...(await this.embedBatch(batch)));
    }

    return vectors;
  }

  private async embedBatch(batch: string[]): Promise<EmbeddingVector[]> {
    const startTime = Date.now();

    try {
      const response = await this.openai.embeddings.create({
        model: this.model,
        input: batch,
      });

      embeddingRequestDurationHistogram.observe({ model: this.model }, (Date.now() - startTime) / 1000);
      embeddingRequestsCounter.inc({ model: this.model, status: 'success' });

      if (response.data.length !== batch.length) {
        throw new ProviderUnavailableError(
          'openai',
          `Expected ${batch.length} embeddings, received ${response.data.length}`
        );
      }

      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);
    } catch (error) {
      embeddingRequestDurationHistogram.observe({ model: this.model }, (Date.now() - startTime) / 1000);
      embeddingRequestsCounter.inc({ model: this.model, status: 'error' });

      if (error instanceof ProviderUnavailableError) {
        throw error;
      }
      throw new ProviderUnavailableError('openai', `OpenAI embedding failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

export interface Providers {
  completion: CompletionClient | null;
  embeddings: EmbeddingProvider | null;
}

/**
 * Build the OpenAI-backed providers, or nulls when no API key is configured.
 */
export function createOpenAiProviders(config: Config): Providers {
  if (!isAiConfigured(config)) {
    logger.warn('OPENAI_API_KEY not set; AI extraction and embedding classification disabled');
    return { completion: null, embeddings: null };
  }

  const openai = new OpenAI({
    apiKey: config.openaiApiKey,
    timeout: Math.max(config.llmRequestTimeoutMs, config.embeddingTimeoutMs),
    maxRetries: 0,
  });

  return {
    completion: new OpenAiCompletionClient(openai, config.llmModelExtraction),
    embeddings: new OpenAiEmbeddingProvider(openai, config.llmModelEmbedding),
  };
}
