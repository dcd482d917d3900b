/**
 * HS Corpus Loading
 *
 * The corpus is a JSON array of { code, description } records read once at
 * startup. Records without a code or description are skipped.
 */

import fs from 'fs';
import { logger } from '../logger';
import type { CorpusEntry } from '../types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep the usable entries of a parsed corpus file, in file order.
 */
export function normalizeCorpus(raw: unknown): CorpusEntry[] {
  if (!Array.isArray(raw)) {
    throw new Error('HS corpus must be a JSON array');
  }

  const entries: CorpusEntry[] = [];
  let skipped = 0;

  for (const item of raw) {
    const code = isRecord(item) ? item.code : undefined;
    const description = isRecord(item) ? item.description : undefined;

    if (typeof code === 'string' && code.trim() && typeof description === 'string' && description.trim()) {
      entries.push({ code: code.trim(), description: description.trim() });
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    logger.warn('Skipped HS corpus records without code or description', { skipped });
  }

  return entries;
}

/**
 * Read the corpus file. A missing file yields an empty corpus (classification
 * then returns no suggestions); an unreadable or malformed file throws.
 */
export function loadCorpus(corpusPath: string): CorpusEntry[] {
  if (!fs.existsSync(corpusPath)) {
    logger.warn('HS corpus file not found, classification will return no suggestions', {
      path: corpusPath,
    });
    return [];
  }

  const entries = normalizeCorpus(JSON.parse(fs.readFileSync(corpusPath, 'utf-8')));
  logger.info('Loaded HS corpus', { path: corpusPath, entries: entries.length });
  return entries;
}
