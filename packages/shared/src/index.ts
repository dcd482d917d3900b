/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  setContextTemplate,
  runWithContext,
  runWithContextAsync,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { loadConfig, isAiConfigured, PROJECT_ROOT, type Config, type Env } from './config';

// Errors
export {
  AppError,
  ValidationError,
  NotFoundError,
  ConflictError,
  ProviderUnavailableError,
  ProviderTimeoutError,
  MalformedResponseError,
  ClassifierUnavailableError,
  isAppError,
  errorMessage,
  type ErrorCode,
} from './errors';

// Types
export * from './types';

// Metrics
export {
  register,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  embeddingRequestsCounter,
  embeddingRequestDurationHistogram,
  fallbackCounter,
  classificationsCounter,
  extractionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  parseFillRequest,
  parseClassifyRequest,
  parseCreateTemplateRequest,
  parseFieldTemplate,
  validateFieldTemplate,
  type ValidationResult,
} from './schemas';

// Two-arm trial
export { runWithFallback, withTimeout, type TrialArms, type TrialOutcome } from './fallback';

// Providers
export * from './providers';

// HS classification
export * from './classification';

// Templates
export * from './templates';

// Field extraction
export * from './extractors';

// Trade agent
export * from './agents';

// Submission history
export * from './history';
