export {
  HsClassifier,
  DEFAULT_TOP_N,
  EMBEDDING_REASONING,
  type HsClassifierOptions,
  type ClassificationOutcome,
} from './hs-classifier';
export {
  KeywordMatcher,
  KEYWORD_CONFIDENCE_DISCOUNT,
  KEYWORD_REASONING,
  roundConfidence,
} from './keyword-matcher';
export { EmbeddingCache } from './embedding-cache';
export { loadCorpus, normalizeCorpus } from './corpus';
export {
  cosineSimilarity,
  clamp01,
  tokenize,
  overlapScore,
  rankByScore,
  type Scored,
} from './similarity';
