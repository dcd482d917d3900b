/**
 * HS Classifier Tests
 *
 * Embedding arm with a bag-of-words fake, keyword fallback on provider
 * failure or timeout, and the bundled corpus.
 */

import fs from 'fs';
import path from 'path';
import {
  ClassifierUnavailableError,
  EMBEDDING_REASONING,
  EmbeddingCache,
  HsClassifier,
  KEYWORD_REASONING,
  PROJECT_ROOT,
  ValidationError,
  loadCorpus,
  type CorpusEntry,
} from '@tradeform/shared';
import {
  failingEmbeddings,
  hangingEmbeddings,
  makeTempDir,
  removeDir,
  vocabularyEmbeddings,
} from './helpers';

const VOCABULARY = ['headphones', 'earphones', 'laptops', 'computers', 'cotton', 'shirts', 'wireless'];

const CORPUS: CorpusEntry[] = [
  { code: '8518.30', description: 'Headphones and earphones' },
  { code: '8471.30', description: 'Portable laptops and computers' },
  { code: '6109.10', description: 'Cotton T-shirts' },
];

function expectNonIncreasing(confidences: number[]): void {
  for (let i = 1; i < confidences.length; i++) {
    expect(confidences[i]).toBeLessThanOrEqual(confidences[i - 1]);
  }
}

describe('HsClassifier', () => {
  describe('embedding arm', () => {
    it('ranks by cosine similarity with ties in corpus order', async () => {
      const { provider } = vocabularyEmbeddings(VOCABULARY);
      const classifier = new HsClassifier({ corpus: CORPUS, embeddings: provider, embeddingTimeoutMs: 1000 });

      const outcome = await classifier.classifyDetailed('wireless headphones', 3);

      expect(outcome.method).toBe('embedding');
      expect(outcome.results).toEqual([
        { code: '8518.30', description: 'Headphones and earphones', confidence: 0.5, reasoning: EMBEDDING_REASONING },
        { code: '8471.30', description: 'Portable laptops and computers', confidence: 0, reasoning: EMBEDDING_REASONING },
        { code: '6109.10', description: 'Cotton T-shirts', confidence: 0, reasoning: EMBEDDING_REASONING },
      ]);
    });

    it('reports full confidence for an exact vocabulary match', async () => {
      const { provider } = vocabularyEmbeddings(VOCABULARY);
      const classifier = new HsClassifier({ corpus: CORPUS, embeddings: provider, embeddingTimeoutMs: 1000 });

      const [top] = await classifier.classify('cotton shirts', 1);

      expect(top.code).toBe('6109.10');
      expect(top.confidence).toBe(1);
    });

    it('embeds the corpus once and reuses it for later queries', async () => {
      const { provider, embed } = vocabularyEmbeddings(VOCABULARY);
      const classifier = new HsClassifier({ corpus: CORPUS, embeddings: provider, embeddingTimeoutMs: 1000 });

      await classifier.classify('wireless headphones', 2);
      await classifier.classify('cotton shirts', 2);

      const corpusCalls = embed.mock.calls.filter(([texts]) => texts.length === CORPUS.length);
      expect(corpusCalls).toHaveLength(1);
      expect(corpusCalls[0][0]).toEqual(CORPUS.map((entry) => entry.description));
      expect(embed).toHaveBeenCalledTimes(3);
    });

    it('shares one corpus computation between concurrent requests', async () => {
      const { provider, embed } = vocabularyEmbeddings(VOCABULARY);
      const classifier = new HsClassifier({ corpus: CORPUS, embeddings: provider, embeddingTimeoutMs: 1000 });

      await Promise.all([
        classifier.classify('wireless headphones', 1),
        classifier.classify('cotton shirts', 1),
        classifier.classify('laptops', 1),
      ]);

      const corpusCalls = embed.mock.calls.filter(([texts]) => texts.length === CORPUS.length);
      expect(corpusCalls).toHaveLength(1);
    });
  });

  describe('embedding cache file', () => {
    let dir: string;

    beforeEach(() => {
      dir = makeTempDir();
    });

    afterEach(() => {
      removeDir(dir);
    });

    it('persists corpus vectors so a new classifier skips recomputation', async () => {
      const cachePath = path.join(dir, 'hs_embeddings.json');

      const first = vocabularyEmbeddings(VOCABULARY);
      const classifier = new HsClassifier({
        corpus: CORPUS,
        embeddings: first.provider,
        embeddingTimeoutMs: 1000,
        cache: new EmbeddingCache('fake-embedding', cachePath),
      });
      expect(await classifier.warmUp()).toBe(true);
      expect(fs.existsSync(cachePath)).toBe(true);

      const second = vocabularyEmbeddings(VOCABULARY);
      const restarted = new HsClassifier({
        corpus: CORPUS,
        embeddings: second.provider,
        embeddingTimeoutMs: 1000,
        cache: new EmbeddingCache('fake-embedding', cachePath),
      });
      const [top] = await restarted.classify('wireless headphones', 1);

      expect(top.code).toBe('8518.30');
      expect(second.embed).toHaveBeenCalledTimes(1);
      expect(second.embed).toHaveBeenCalledWith(['wireless headphones']);
    });

    it('recomputes corpus vectors whose dimensions no longer match the provider', async () => {
      const cachePath = path.join(dir, 'hs_embeddings.json');
      const entries = Object.fromEntries(CORPUS.map((entry) => [EmbeddingCache.keyFor(entry.description), [1, 0]]));
      fs.writeFileSync(cachePath, JSON.stringify({ model: 'fake-embedding', dimensions: 2, entries }));

      const { provider, embed } = vocabularyEmbeddings(VOCABULARY);
      const classifier = new HsClassifier({
        corpus: CORPUS,
        embeddings: provider,
        embeddingTimeoutMs: 1000,
        cache: new EmbeddingCache('fake-embedding', cachePath),
      });

      expect((await classifier.classifyDetailed('wireless headphones', 1)).method).toBe('keyword');

      const outcome = await classifier.classifyDetailed('wireless headphones', 1);
      expect(outcome.method).toBe('embedding');
      expect(outcome.results[0].code).toBe('8518.30');
      expect(embed.mock.calls.filter(([texts]) => texts.length === CORPUS.length)).toHaveLength(1);
      expect(JSON.parse(fs.readFileSync(cachePath, 'utf-8')).dimensions).toBe(VOCABULARY.length);
    });
  });

  describe('keyword fallback', () => {
    it('is used when no embedding provider is configured', async () => {
      const classifier = new HsClassifier({ corpus: CORPUS, embeddings: null, embeddingTimeoutMs: 1000 });

      const outcome = await classifier.classifyDetailed('wireless headphones', 1);

      expect(outcome.method).toBe('keyword');
      expect(outcome.results).toEqual([
        { code: '8518.30', description: 'Headphones and earphones', confidence: 0.25, reasoning: KEYWORD_REASONING },
      ]);
    });

    it('takes over when the provider fails', async () => {
      const { provider, embed } = failingEmbeddings();
      const classifier = new HsClassifier({ corpus: CORPUS, embeddings: provider, embeddingTimeoutMs: 1000 });

      const outcome = await classifier.classifyDetailed('wireless headphones', 2);

      expect(embed).toHaveBeenCalled();
      expect(outcome.method).toBe('keyword');
      expect(outcome.results.map((r) => [r.code, r.confidence])).toEqual([
        ['8518.30', 0.25],
        ['8471.30', 0],
      ]);
    });

    it('takes over when the provider does not answer in time', async () => {
      const { provider } = hangingEmbeddings();
      const classifier = new HsClassifier({ corpus: CORPUS, embeddings: provider, embeddingTimeoutMs: 20 });

      const outcome = await classifier.classifyDetailed('cotton shirts', 1);

      expect(outcome.method).toBe('keyword');
      expect(outcome.results[0].code).toBe('6109.10');
      expect(outcome.results[0].confidence).toBe(0.5);
    });

    it('retries the embedding arm on the next request after a failure', async () => {
      const vectors = vocabularyEmbeddings(VOCABULARY);
      let fail = true;
      const provider = {
        model: 'fake-embedding',
        embed: async (texts: string[]) => {
          if (fail) throw new Error('provider down');
          return vectors.provider.embed(texts);
        },
      };
      const classifier = new HsClassifier({ corpus: CORPUS, embeddings: provider, embeddingTimeoutMs: 1000 });

      expect((await classifier.classifyDetailed('wireless headphones', 1)).method).toBe('keyword');
      // let the failed corpus computation settle
      await new Promise((resolve) => setImmediate(resolve));
      fail = false;
      expect((await classifier.classifyDetailed('wireless headphones', 1)).method).toBe('embedding');
    });
  });

  describe('input handling', () => {
    const classifier = new HsClassifier({ corpus: CORPUS, embeddings: null, embeddingTimeoutMs: 1000 });

    it('rejects a blank description', async () => {
      await expect(classifier.classify('   ', 3)).rejects.toBeInstanceOf(ValidationError);
    });

    it('clamps topN to [1, corpus size]', async () => {
      expect(await classifier.classify('cotton', 0)).toHaveLength(1);
      expect(await classifier.classify('cotton', 50)).toHaveLength(3);
    });

    it('returns nothing for an empty corpus', async () => {
      const empty = new HsClassifier({ corpus: [], embeddings: null, embeddingTimeoutMs: 1000 });
      expect(await empty.classifyDetailed('anything', 5)).toEqual({ results: [], method: 'none' });
    });

    it('reports unavailability when both arms fail', async () => {
      const broken: CorpusEntry[] = [{ code: '0000.00', description: 'placeholder' }];
      const classifier = new HsClassifier({ corpus: broken, embeddings: null, embeddingTimeoutMs: 1000 });
      jest.spyOn(classifier['keywordMatcher'], 'match').mockImplementation(() => {
        throw new Error('index corrupted');
      });

      await expect(classifier.classify('placeholder', 1)).rejects.toBeInstanceOf(ClassifierUnavailableError);
    });
  });

  describe('bundled corpus', () => {
    const corpus = loadCorpus(path.join(PROJECT_ROOT, 'data', 'hs_corpus.json'));
    const classifier = new HsClassifier({ corpus, embeddings: null, embeddingTimeoutMs: 1000 });

    it('loads every record', () => {
      expect(classifier.corpusSize).toBe(507);
    });

    it('puts the headphone entry first for a headphone description', async () => {
      const results = await classifier.classify('wireless bluetooth headphones', 3);

      expect(results).toHaveLength(3);
      expect(results[0].code).toBe('8518.30');
      expect(results[0].confidence).toBe(0.1667);
      expect(results.slice(1).map((r) => r.code)).toEqual(['0101.21', '0102.21']);
      expectNonIncreasing(results.map((r) => r.confidence));
    });

    it('matches a description word for word', async () => {
      const results = await classifier.classify('microwave ovens', 2);

      expect(results.map((r) => [r.code, r.confidence])).toEqual([
        ['8516.50', 0.5],
        ['8516.60', 0.25],
      ]);
    });

    it('returns non-increasing confidences for any description', async () => {
      for (const description of ['frozen fish fillets', 'laptop computer', 'cotton t-shirts knitted', 'olive oil']) {
        const results = await classifier.classify(description, 10);
        expectNonIncreasing(results.map((r) => r.confidence));
      }
    });
  });
});
