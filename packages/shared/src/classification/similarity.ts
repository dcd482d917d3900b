/**
 * Similarity Scoring
 *
 * Cosine similarity for embedding vectors, token overlap for the keyword
 * fallback, and the stable top-N ranking both share.
 */

import type { EmbeddingVector } from '../types';

/**
 * Cosine similarity in [-1, 1]. Zero vectors score 0.
 * Throws on a dimension mismatch (e.g. a cache built with another model).
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new Error(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Lowercase, turn every non-letter/non-digit into whitespace, split.
 */
export function tokenize(text: string): Set<string> {
  const tokens = text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 0);
  return new Set(tokens);
}

/**
 * |query ∩ document| / |query|, 0 for an empty query.
 */
export function overlapScore(queryTokens: Set<string>, documentTokens: Set<string>): number {
  if (queryTokens.size === 0) return 0;

  let shared = 0;
  for (const token of queryTokens) {
    if (documentTokens.has(token)) shared++;
  }
  return shared / queryTokens.size;
}

export interface Scored<T> {
  item: T;
  score: number;
}

/**
 * Highest score first; equal scores keep input order. Returns at most `limit`.
 */
export function rankByScore<T>(scored: Scored<T>[], limit: number): Scored<T>[] {
  return scored
    .map((entry, position) => ({ entry, position }))
    .sort((a, b) => b.entry.score - a.entry.score || a.position - b.position)
    .slice(0, Math.max(0, limit))
    .map(({ entry }) => entry);
}
