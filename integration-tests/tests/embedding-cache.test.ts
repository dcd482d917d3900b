/**
 * Embedding Cache Tests
 */

import fs from 'fs';
import path from 'path';
import { EmbeddingCache } from '@tradeform/shared';
import { makeTempDir, removeDir } from './helpers';

describe('EmbeddingCache', () => {
  let dir: string;
  let cachePath: string;

  beforeEach(() => {
    dir = makeTempDir();
    cachePath = path.join(dir, 'nested', 'hs_embeddings.json');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('keys entries by the SHA-256 of the text', () => {
    expect(EmbeddingCache.keyFor('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });

  it('overwrites an existing entry', () => {
    const cache = new EmbeddingCache('model-a');
    cache.set('coffee', [1, 0]);
    cache.set('coffee', [0, 1]);

    expect(cache.size).toBe(1);
    expect(cache.get('coffee')).toEqual([0, 1]);
    expect(cache.get('tea')).toBeUndefined();
  });

  it('round-trips through the cache file, creating its directory', async () => {
    const cache = new EmbeddingCache('model-a', cachePath);
    cache.set('coffee', [0.1, 0.2]);
    cache.set('tea', [0.3, 0.4]);
    await cache.persist();

    const reloaded = new EmbeddingCache('model-a', cachePath);
    expect(await reloaded.load()).toBe(2);
    expect(reloaded.get('tea')).toEqual([0.3, 0.4]);
  });

  it('records the vector dimensions in the cache file', async () => {
    const cache = new EmbeddingCache('model-a', cachePath);
    expect(cache.dimensions).toBeNull();
    cache.set('coffee', [0.1, 0.2, 0.3]);
    await cache.persist();

    const file = JSON.parse(fs.readFileSync(cachePath, 'utf-8'));
    expect(file.model).toBe('model-a');
    expect(file.dimensions).toBe(3);
  });

  it('drops vectors whose length differs from the recorded dimensions', async () => {
    fs.mkdirSync(path.dirname(cachePath), { recursive: true });
    fs.writeFileSync(
      cachePath,
      JSON.stringify({ model: 'model-a', dimensions: 3, entries: { short: [1, 2], full: [1, 2, 3] } })
    );

    const cache = new EmbeddingCache('model-a', cachePath);
    expect(await cache.load()).toBe(1);
    expect(cache.dimensions).toBe(3);
  });

  it('forgets every entry on clear', () => {
    const cache = new EmbeddingCache('model-a');
    cache.set('coffee', [1, 0]);
    cache.clear();

    expect(cache.size).toBe(0);
    expect(cache.get('coffee')).toBeUndefined();
  });

  it('ignores a file written for another model', async () => {
    const cache = new EmbeddingCache('model-a', cachePath);
    cache.set('coffee', [0.1, 0.2]);
    await cache.persist();

    const other = new EmbeddingCache('model-b', cachePath);
    expect(await other.load()).toBe(0);
    expect(other.size).toBe(0);
  });

  it('starts empty from a missing, malformed or unparsable file', async () => {
    expect(await new EmbeddingCache('model-a', cachePath).load()).toBe(0);

    fs.mkdirSync(path.dirname(cachePath), { recursive: true });
    fs.writeFileSync(cachePath, '{"entries": {}}');
    expect(await new EmbeddingCache('model-a', cachePath).load()).toBe(0);

    fs.writeFileSync(cachePath, 'not json');
    expect(await new EmbeddingCache('model-a', cachePath).load()).toBe(0);
  });

  it('skips entries that are not numeric vectors', async () => {
    fs.mkdirSync(path.dirname(cachePath), { recursive: true });
    fs.writeFileSync(
      cachePath,
      JSON.stringify({ model: 'model-a', entries: { good: [1, 2], bad: ['x'], worse: 3 } })
    );

    expect(await new EmbeddingCache('model-a', cachePath).load()).toBe(1);
  });
});
