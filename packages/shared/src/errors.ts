/**
 * Error Taxonomy
 *
 * Every error a component raises on purpose extends AppError and carries the
 * envelope code the HTTP layer reports.
 */

export type ErrorCode =
  | 'invalid_request'
  | 'not_found'
  | 'conflict'
  | 'service_unavailable'
  | 'internal_error';

export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing or malformed request input. */
export class ValidationError extends AppError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super('invalid_request', message);
    this.details = details;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('not_found', message);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super('conflict', message);
  }
}

/** Credential missing, network failure or provider error. Triggers fallback. */
export class ProviderUnavailableError extends AppError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super('service_unavailable', message, options);
    this.provider = provider;
  }
}

export class ProviderTimeoutError extends ProviderUnavailableError {
  readonly timeoutMs: number;

  constructor(provider: string, timeoutMs: number) {
    super(provider, `${provider} did not respond within ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/** Model output that cannot be read as a field map. Triggers fallback. */
export class MalformedResponseError extends AppError {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super('internal_error', message);
    this.raw = raw.slice(0, 500);
  }
}

/** Both the embedding and the keyword arm of the classifier failed. */
export class ClassifierUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('service_unavailable', message, options);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
