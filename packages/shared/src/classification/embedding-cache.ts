/**
 * Corpus Embedding Cache
 *
 * Memoization table keyed by the SHA-256 of the embedded text. Eviction
 * policy: never evict. It only ever holds corpus descriptions, so its size is
 * bounded by the static corpus.
 *
 * Optionally mirrored to a JSON file so restarts skip recomputation. A file
 * written for a different embedding model is ignored, and so are vectors
 * whose length differs from the dimensions the file records.
 */

import { createHash } from 'node:crypto';
import fs from 'fs';
import path from 'path';
import { logger } from '../logger';
import { errorMessage } from '../errors';
import type { EmbeddingVector } from '../types';

interface CacheFile {
  model: string;
  dimensions?: number;
  entries: Record<string, EmbeddingVector>;
}

function isCacheFile(value: unknown): value is CacheFile {
  if (typeof value !== 'object' || value === null) return false;
  if (!('model' in value) || !('entries' in value)) return false;
  return typeof value.model === 'string' && typeof value.entries === 'object' && value.entries !== null;
}

function isVector(value: unknown): value is EmbeddingVector {
  return Array.isArray(value) && value.every((n) => typeof n === 'number');
}

export class EmbeddingCache {
  private readonly entries = new Map<string, EmbeddingVector>();

  constructor(
    readonly model: string,
    private readonly filePath: string | null = null
  ) {}

  static keyFor(text: string): string {
    return createHash('sha256').update(text, 'utf8').digest('hex');
  }

  get size(): number {
    return this.entries.size;
  }

  /** Length of the stored vectors, null while empty */
  get dimensions(): number | null {
    for (const vector of this.entries.values()) {
      return vector.length;
    }
    return null;
  }

  get(text: string): EmbeddingVector | undefined {
    return this.entries.get(EmbeddingCache.keyFor(text));
  }

  /** Idempotent overwrite */
  set(text: string, vector: EmbeddingVector): void {
    this.entries.set(EmbeddingCache.keyFor(text), vector);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Populate from the cache file. Returns the number of vectors loaded.
   */
  async load(): Promise<number> {
    if (!this.filePath || !fs.existsSync(this.filePath)) return 0;

    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.promises.readFile(this.filePath, 'utf-8'));
    } catch (error) {
      logger.warn('Unreadable embedding cache file, starting empty', {
        path: this.filePath,
        error: errorMessage(error),
      });
      return 0;
    }
    if (!isCacheFile(parsed)) {
      logger.warn('Ignoring malformed embedding cache file', { path: this.filePath });
      return 0;
    }
    if (parsed.model !== this.model) {
      logger.info('Ignoring embedding cache built for another model', {
        path: this.filePath,
        cached_model: parsed.model,
        model: this.model,
      });
      return 0;
    }

    const dimensions = typeof parsed.dimensions === 'number' ? parsed.dimensions : null;

    let loaded = 0;
    for (const [key, vector] of Object.entries(parsed.entries)) {
      if (isVector(vector) && (dimensions === null || vector.length === dimensions)) {
        this.entries.set(key, vector);
        loaded++;
      }
    }

    logger.info('Loaded embedding cache', { path: this.filePath, entries: loaded });
    return loaded;
  }

  /**
   * Write the table to the cache file. Failure is logged; the in-memory
   * table stays authoritative.
   */
  async persist(): Promise<void> {
    if (!this.filePath) return;

    const dimensions = this.dimensions;
    const file: CacheFile = {
      model: this.model,
      ...(dimensions !== null ? { dimensions } : {}),
      entries: Object.fromEntries(this.entries),
    };
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(this.filePath, JSON.stringify(file));
      logger.debug('Persisted embedding cache', { path: this.filePath, entries: this.entries.size });
    } catch (error) {
      logger.warn('Failed to persist embedding cache', {
        path: this.filePath,
        error: errorMessage(error),
      });
    }
  }
}
