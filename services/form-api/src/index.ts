/**
 * Form API service entry point
 */

import {
  FieldExtractionAgent,
  HsClassifier,
  InMemoryHistoryStore,
  TradeAgent,
  createOpenAiProviders,
  isAiConfigured,
  loadConfig,
  logger,
  type HistoryStore,
} from '@tradeform/shared';
import { createApp } from './lib/app';
import { PgHistoryStore } from './lib/db';
import { FileTemplateStore } from './lib/templates';

const config = loadConfig();
const providers = createOpenAiProviders(config);

const classifier = HsClassifier.fromConfig(config, providers.embeddings);
const extractor = new FieldExtractionAgent(providers.completion, config.llmRequestTimeoutMs);
const tradeAgent = new TradeAgent(extractor, classifier, {
  acceptanceThreshold: config.hsAcceptanceThreshold,
  topN: config.hsAutoClassifyTopN,
});

const history: HistoryStore = config.databaseUrl
  ? new PgHistoryStore({
      connectionString: config.databaseUrl,
      embeddings: providers.embeddings,
      embeddingTimeoutMs: config.embeddingTimeoutMs,
    })
  : new InMemoryHistoryStore(providers.embeddings, config.embeddingTimeoutMs);

const app = createApp({
  templates: new FileTemplateStore(config.templateDir),
  classifier,
  tradeAgent,
  history,
  aiEnabled: isAiConfigured(config),
});

// Start server
const server = app.listen(config.port, () => {
  logger.info('Form API started', {
    port: config.port,
    history_store: history.kind,
    corpus_size: classifier.corpusSize,
    ai_enabled: isAiConfigured(config),
  });
});

// Embed the corpus ahead of the first request; failure leaves the keyword arm in use
classifier.warmUp().then((ready) => {
  logger.info('HS classifier warm-up finished', { embeddings_ready: ready });
}, (error: unknown) => {
  logger.error('HS classifier warm-up failed', error);
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
  try {
    await history.close();
  } catch (error) {
    logger.error('Failed to close history store', error);
  }
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
