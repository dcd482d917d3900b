/**
 * Submission Ranking
 *
 * Similarity ordering shared by every history back end: cosine similarity
 * over stored embeddings when the query could be embedded, keyword overlap
 * on the stored input text otherwise.
 */

import { cosineSimilarity, overlapScore, rankByScore, tokenize } from '../classification/similarity';
import { errorMessage } from '../errors';
import { withTimeout } from '../fallback';
import { logger } from '../logger';
import type { EmbeddingProvider } from '../providers/types';
import type { EmbeddingVector, SubmissionRecord } from '../types';

export const DEFAULT_HISTORY_LIMIT = 10;
export const MAX_HISTORY_LIMIT = 100;

export function clampHistoryLimit(limit: number): number {
  const requested = Number.isFinite(limit) ? Math.floor(limit) : DEFAULT_HISTORY_LIMIT;
  return Math.min(Math.max(1, requested), MAX_HISTORY_LIMIT);
}

/**
 * Embed one text, or null when no provider is configured or the call fails.
 */
export async function embedOrNull(
  embeddings: EmbeddingProvider | null,
  text: string,
  timeoutMs: number
): Promise<EmbeddingVector | null> {
  if (!embeddings || !text.trim()) return null;

  try {
    const [vector] = await withTimeout(embeddings.embed([text]), timeoutMs, 'embeddings');
    return vector ?? null;
  } catch (error) {
    logger.warn('Submission embedding unavailable, using keyword ranking', {
      error: errorMessage(error),
    });
    return null;
  }
}

function embeddingScore(query: EmbeddingVector, record: SubmissionRecord): number {
  if (!record.embedding || record.embedding.length !== query.length) return 0;
  return cosineSimilarity(query, record.embedding);
}

/**
 * Order `records` (given oldest first) by descending similarity to the query;
 * ties keep insertion order.
 */
export function rankSubmissions(
  records: SubmissionRecord[],
  query: string,
  queryVector: EmbeddingVector | null,
  limit: number
): SubmissionRecord[] {
  if (queryVector) {
    const scored = records.map((record) => ({ item: record, score: embeddingScore(queryVector, record) }));
    return rankByScore(scored, limit).map(({ item }) => item);
  }

  const queryTokens = tokenize(query);
  const scored = records.map((record) => ({
    item: record,
    score: overlapScore(queryTokens, tokenize(record.inputText)),
  }));
  return rankByScore(scored, limit).map(({ item }) => item);
}
