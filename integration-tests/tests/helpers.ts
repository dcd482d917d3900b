/**
 * Test Helpers
 *
 * In-process fakes for the hosted model and a throwaway HTTP server.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import type { Express } from 'express';
import {
  tokenize,
  type CompletionClient,
  type CompletionRequest,
  type EmbeddingProvider,
  type EmbeddingVector,
} from '@tradeform/shared';

/**
 * Bag-of-words vectors over a fixed vocabulary: component i is 1 when the
 * text contains vocabulary[i]. Cosine similarities are easy to work out by hand.
 */
export function vocabularyVector(vocabulary: string[], text: string): EmbeddingVector {
  const tokens = tokenize(text);
  return vocabulary.map((word) => (tokens.has(word) ? 1 : 0));
}

export function vocabularyEmbeddings(vocabulary: string[]) {
  const embed = jest.fn(async (texts: string[]): Promise<EmbeddingVector[]> =>
    texts.map((text) => vocabularyVector(vocabulary, text))
  );
  const provider: EmbeddingProvider = { model: 'fake-embedding', embed };
  return { provider, embed };
}

export function failingEmbeddings(message = 'connect ECONNREFUSED') {
  const embed = jest.fn(async (_texts: string[]): Promise<EmbeddingVector[]> => {
    throw new Error(message);
  });
  const provider: EmbeddingProvider = { model: 'fake-embedding', embed };
  return { provider, embed };
}

/** An embedding call that never settles */
export function hangingEmbeddings() {
  const embed = jest.fn((_texts: string[]) => new Promise<EmbeddingVector[]>(() => undefined));
  const provider: EmbeddingProvider = { model: 'fake-embedding', embed };
  return { provider, embed };
}

export function fakeCompletion(reply: (request: CompletionRequest) => Promise<string>) {
  const complete = jest.fn(reply);
  const client: CompletionClient = { model: 'fake-llm', complete };
  return { client, complete };
}

export function makeTempDir(prefix = 'tradeform-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export interface RunningServer {
  baseUrl: string;
  close(): Promise<void>;
}

/**
 * Listen on an ephemeral port on localhost.
 */
export function startServer(app: Express): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server did not bind to a TCP port'));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
    server.on('error', reject);
  });
}

export async function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}
