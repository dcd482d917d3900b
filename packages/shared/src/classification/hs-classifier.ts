/**
 * HS Classifier
 *
 * Ranks corpus entries against a product description. Embedding similarity
 * is the primary arm; keyword overlap takes over when no embedding provider
 * is configured or the provider fails or times out.
 *
 * Confidence normalization:
 * - embedding arm: cosine similarity clamped to [0, 1]
 * - keyword arm: overlap ratio × KEYWORD_CONFIDENCE_DISCOUNT (max 0.5)
 */

import type { Config } from '../config';
import { ClassifierUnavailableError, ValidationError, errorMessage } from '../errors';
import { runWithFallback, withTimeout } from '../fallback';
import { logger } from '../logger';
import { classificationsCounter } from '../metrics';
import type { EmbeddingProvider } from '../providers/types';
import type {
  ClassificationMethod,
  ClassificationResult,
  CorpusEntry,
  EmbeddingVector,
} from '../types';
import { loadCorpus } from './corpus';
import { EmbeddingCache } from './embedding-cache';
import { KeywordMatcher, roundConfidence } from './keyword-matcher';
import { clamp01, cosineSimilarity, rankByScore } from './similarity';

export const DEFAULT_TOP_N = 5;

export const EMBEDDING_REASONING = 'Semantic similarity match';

export interface HsClassifierOptions {
  corpus: CorpusEntry[];
  embeddings: EmbeddingProvider | null;
  embeddingTimeoutMs: number;
  /** Defaults to an unpersisted cache for the provider's model */
  cache?: EmbeddingCache;
}

export interface ClassificationOutcome {
  results: ClassificationResult[];
  method: ClassificationMethod;
}

export class HsClassifier {
  private readonly corpus: CorpusEntry[];
  private readonly embeddings: EmbeddingProvider | null;
  private readonly embeddingTimeoutMs: number;
  private readonly cache: EmbeddingCache;
  private readonly keywordMatcher: KeywordMatcher;

  private cacheLoaded = false;
  /** Single in-flight corpus embedding computation shared by concurrent callers */
  private corpusVectors: Promise<EmbeddingVector[]> | null = null;

  constructor(options: HsClassifierOptions) {
    this.corpus = options.corpus;
    this.embeddings = options.embeddings;
    this.embeddingTimeoutMs = options.embeddingTimeoutMs;
    this.cache = options.cache ?? new EmbeddingCache(options.embeddings?.model ?? 'none');
    this.keywordMatcher = new KeywordMatcher(options.corpus);
  }

  /**
   * Load the corpus named by the configuration and wire the embedding cache file.
   */
  static fromConfig(config: Config, embeddings: EmbeddingProvider | null): HsClassifier {
    const corpus = loadCorpus(config.hsCorpusPath);
    const cache = new EmbeddingCache(
      embeddings?.model ?? config.llmModelEmbedding,
      config.embeddingCachePath || null
    );

    return new HsClassifier({
      corpus,
      embeddings,
      embeddingTimeoutMs: config.embeddingTimeoutMs,
      cache,
    });
  }

  get corpusSize(): number {
    return this.corpus.length;
  }

  get embeddingsEnabled(): boolean {
    return this.embeddings !== null;
  }

  /**
   * Top-N suggestions, highest confidence first.
   */
  async classify(description: string, topN: number = DEFAULT_TOP_N): Promise<ClassificationResult[]> {
    const outcome = await this.classifyDetailed(description, topN);
    return outcome.results;
  }

  /**
   * Like classify, also reporting which arm produced the results.
   */
  async classifyDetailed(description: string, topN: number = DEFAULT_TOP_N): Promise<ClassificationOutcome> {
    if (!description || !description.trim()) {
      throw new ValidationError('product description is required');
    }

    if (this.corpus.length === 0) {
      logger.warn('HS corpus is empty, no suggestions');
      return { results: [], method: 'none' };
    }

    const limit = this.clampTopN(topN);
    const embeddings = this.embeddings;

    try {
      const outcome = await runWithFallback({
        component: 'hs_classifier',
        primary: embeddings ? () => this.classifyByEmbedding(embeddings, description, limit) : null,
        fallback: () => this.keywordMatcher.match(description, limit),
      });

      const method: ClassificationMethod = outcome.source === 'primary' ? 'embedding' : 'keyword';
      classificationsCounter.inc({ method });

      logger.info('HS classification complete', {
        method,
        top_n: limit,
        top_code: outcome.value[0]?.code,
        top_confidence: outcome.value[0]?.confidence,
      });

      return { results: outcome.value, method };
    } catch (error) {
      throw new ClassifierUnavailableError(`HS classification unavailable: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Compute (or load) embeddings for the whole corpus ahead of the first
   * request. Failure is logged; requests then use the keyword arm until a
   * later attempt succeeds.
   */
  async warmUp(): Promise<boolean> {
    if (!this.embeddings || this.corpus.length === 0) return false;

    try {
      await this.ensureCorpusEmbeddings(this.embeddings);
      return true;
    } catch (error) {
      logger.warn('HS corpus embedding warm-up failed', { error: errorMessage(error) });
      return false;
    }
  }

  private clampTopN(topN: number): number {
    const requested = Number.isFinite(topN) ? Math.floor(topN) : DEFAULT_TOP_N;
    return Math.min(Math.max(1, requested), this.corpus.length);
  }

  private async classifyByEmbedding(
    embeddings: EmbeddingProvider,
    description: string,
    limit: number
  ): Promise<ClassificationResult[]> {
    const [corpusVectors, queryVectors] = await Promise.all([
      this.ensureCorpusEmbeddings(embeddings),
      withTimeout(embeddings.embed([description]), this.embeddingTimeoutMs, 'embeddings'),
    ]);

    const queryVector = queryVectors[0];
    if (!queryVector) {
      throw new Error('Embedding provider returned no vector for the query');
    }

    const corpusDimensions = corpusVectors[0]?.length ?? queryVector.length;
    if (corpusDimensions !== queryVector.length) {
      // Stale vectors from an earlier provider setup; recompute on the next request
      this.cache.clear();
      this.corpusVectors = null;
      throw new Error(
        `Corpus embeddings have ${corpusDimensions} dimensions, query has ${queryVector.length}`
      );
    }

    const scored = this.corpus.map((entry, i) => ({
      item: entry,
      score: cosineSimilarity(queryVector, corpusVectors[i]),
    }));

    return rankByScore(scored, limit).map(({ item, score }) => ({
      code: item.code,
      description: item.description,
      confidence: roundConfidence(clamp01(score)),
      reasoning: EMBEDDING_REASONING,
    }));
  }

  private ensureCorpusEmbeddings(embeddings: EmbeddingProvider): Promise<EmbeddingVector[]> {
    if (!this.corpusVectors) {
      this.corpusVectors = this.computeCorpusEmbeddings(embeddings).catch((error: unknown) => {
        // Forget the failure so the next request tries again
        this.corpusVectors = null;
        throw error;
      });
    }
    return this.corpusVectors;
  }

  private async computeCorpusEmbeddings(embeddings: EmbeddingProvider): Promise<EmbeddingVector[]> {
    if (!this.cacheLoaded) {
      await this.cache.load();
      this.cacheLoaded = true;
    }

    const missing = this.corpus.filter((entry) => !this.cache.get(entry.description));

    if (missing.length > 0) {
      const startTime = Date.now();
      const descriptions = missing.map((entry) => entry.description);
      const vectors = await withTimeout(
        embeddings.embed(descriptions),
        this.embeddingTimeoutMs,
        'embeddings'
      );

      if (vectors.length !== descriptions.length) {
        throw new Error(`Expected ${descriptions.length} corpus embeddings, received ${vectors.length}`);
      }

      descriptions.forEach((text, i) => this.cache.set(text, vectors[i]));
      await this.cache.persist();

      logger.info('Computed HS corpus embeddings', {
        computed: descriptions.length,
        cached: this.corpus.length - descriptions.length,
        duration_ms: Date.now() - startTime,
      });
    }

    return this.corpus.map((entry) => {
      const vector = this.cache.get(entry.description);
      if (!vector) {
        throw new Error(`Missing embedding for HS code ${entry.code}`);
      }
      return vector;
    });
  }
}
