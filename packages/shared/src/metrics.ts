/**
 * Prometheus Metrics
 *
 * Metrics for HTTP traffic, provider calls, fallbacks and history queries.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Provider Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'tradeform_llm_requests_total',
  help: 'Total number of LLM completion requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'tradeform_llm_request_duration_seconds',
  help: 'Duration of LLM completion requests',
  labelNames: ['model'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export const embeddingRequestsCounter = new promClient.Counter({
  name: 'tradeform_embedding_requests_total',
  help: 'Total number of embedding requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const embeddingRequestDurationHistogram = new promClient.Histogram({
  name: 'tradeform_embedding_request_duration_seconds',
  help: 'Duration of embedding requests',
  labelNames: ['model'],
  buckets: [0.1, 0.25, 0.5, 1, 2, 5, 15],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const fallbackCounter = new promClient.Counter({
  name: 'tradeform_fallbacks_total',
  help: 'Times a component switched from its primary to its fallback source',
  labelNames: ['component'],
  registers: [register],
});

export const classificationsCounter = new promClient.Counter({
  name: 'tradeform_hs_classifications_total',
  help: 'HS classifications by method used',
  labelNames: ['method'],
  registers: [register],
});

export const extractionsCounter = new promClient.Counter({
  name: 'tradeform_form_extractions_total',
  help: 'Form extractions by method used',
  labelNames: ['method'],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'tradeform_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'tradeform_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

// ============================================================================
// Database Metrics
// ============================================================================

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'tradeform_db_query_duration_seconds',
  help: 'Duration of database queries',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
