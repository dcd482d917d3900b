/**
 * Centralized Configuration
 *
 * Built once at process start from environment variables and handed to each
 * component's constructor. The returned object is frozen.
 */

import fs from 'fs';
import path from 'path';

export interface Config {
  // HTTP
  port: number;

  // LLM
  openaiApiKey: string;
  llmModelExtraction: string;
  llmModelEmbedding: string;
  llmRequestTimeoutMs: number;
  embeddingTimeoutMs: number;

  // HS classification
  hsCorpusPath: string;
  embeddingCachePath: string;
  hsAcceptanceThreshold: number;
  hsAutoClassifyTopN: number;

  // Templates
  templateDir: string;

  // History store (empty = in-process store)
  databaseUrl: string;
}

export type Env = Record<string, string | undefined>;

/**
 * Nearest ancestor holding the bundled form templates and corpus; works from
 * the sources and from the compiled output under dist/.
 */
function findProjectRoot(start: string): string {
  let dir = start;
  while (true) {
    if (fs.existsSync(path.join(dir, 'form-templates')) && fs.existsSync(path.join(dir, 'data'))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return process.cwd();
    dir = parent;
  }
}

export const PROJECT_ROOT = findProjectRoot(__dirname);

function intFrom(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function floatFrom(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value || '');
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Build the configuration from an environment map (defaults to process.env).
 */
export function loadConfig(env: Env = process.env): Readonly<Config> {
  return Object.freeze({
    // HTTP
    port: intFrom(env.PORT, 8080),

    // LLM
    openaiApiKey: env.OPENAI_API_KEY || '',
    llmModelExtraction: env.LLM_MODEL_EXTRACTION || 'gpt-4o-mini',
    llmModelEmbedding: env.LLM_MODEL_EMBEDDING || 'text-embedding-3-small',
    llmRequestTimeoutMs: intFrom(env.LLM_REQUEST_TIMEOUT_MS, 30000),
    embeddingTimeoutMs: intFrom(env.EMBEDDING_TIMEOUT_MS, 15000),

    // HS classification
    hsCorpusPath: env.HS_CORPUS_PATH || path.join(PROJECT_ROOT, 'data', 'hs_corpus.json'),
    embeddingCachePath: env.EMBEDDING_CACHE_PATH ?? path.join(PROJECT_ROOT, '.cache', 'hs_embeddings.json'),
    hsAcceptanceThreshold: floatFrom(env.HS_ACCEPTANCE_THRESHOLD, 0.15),
    hsAutoClassifyTopN: Math.max(1, intFrom(env.HS_AUTO_CLASSIFY_TOP_N, 1)),

    // Templates
    templateDir: env.TEMPLATE_DIR || path.join(PROJECT_ROOT, 'form-templates'),

    // History store
    databaseUrl: env.DATABASE_URL || '',
  });
}

/**
 * Whether the hosted model provider can be called at all.
 */
export function isAiConfigured(config: Config): boolean {
  return config.openaiApiKey.trim().length > 0;
}
