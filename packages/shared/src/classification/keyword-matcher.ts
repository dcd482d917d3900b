/**
 * Keyword Fallback Matcher
 *
 * Scores corpus entries by the share of query tokens found in the entry's
 * description. Lexical overlap is a weaker signal than embedding similarity,
 * so confidences are scaled by KEYWORD_CONFIDENCE_DISCOUNT and never exceed it.
 */

import type { ClassificationResult, CorpusEntry } from '../types';
import { overlapScore, rankByScore, tokenize } from './similarity';

export const KEYWORD_CONFIDENCE_DISCOUNT = 0.5;

export const KEYWORD_REASONING = 'Keyword overlap match (fallback)';

export function roundConfidence(value: number): number {
  return Math.round(value * 10000) / 10000;
}

export class KeywordMatcher {
  private readonly index: Array<{ entry: CorpusEntry; tokens: Set<string> }>;

  constructor(corpus: CorpusEntry[]) {
    this.index = corpus.map((entry) => ({ entry, tokens: tokenize(entry.description) }));
  }

  match(query: string, limit: number): ClassificationResult[] {
    const queryTokens = tokenize(query);

    const scored = this.index.map(({ entry, tokens }) => ({
      item: entry,
      score: overlapScore(queryTokens, tokens),
    }));

    return rankByScore(scored, limit).map(({ item, score }) => ({
      code: item.code,
      description: item.description,
      confidence: roundConfidence(score * KEYWORD_CONFIDENCE_DISCOUNT),
      reasoning: KEYWORD_REASONING,
    }));
  }
}
