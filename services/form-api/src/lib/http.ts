/**
 * HTTP helpers: error envelopes and async route wrapping.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import {
  getCorrelationId,
  isAppError,
  logger,
  ValidationError,
  type ErrorCode,
  type ErrorEnvelope,
} from '@tradeform/shared';

export const STATUS_BY_CODE: Record<ErrorCode, number> = {
  invalid_request: 400,
  not_found: 404,
  conflict: 409,
  service_unavailable: 503,
  internal_error: 500,
};

export function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : getCorrelationId();
}

export function sendError(
  res: Response,
  status: number,
  code: ErrorCode,
  message: string,
  details?: string[]
): void {
  const envelope: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
      ...(details && details.length > 0 ? { details } : {}),
    },
  };
  res.status(status).json(envelope);
}

/**
 * Forward rejections of an async handler to the error middleware.
 */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * Map errors to the envelope: AppError codes keep their status, malformed
 * JSON bodies are 400, anything else is a logged 500.
 */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (isBodyParseError(error)) {
    sendError(res, 400, 'invalid_request', 'Request body is not valid JSON');
    return;
  }

  if (isAppError(error)) {
    const status = STATUS_BY_CODE[error.code];
    if (status >= 500) {
      logger.error('Request failed', error, { method: req.method, path: req.path });
    } else {
      logger.warn('Request rejected', { method: req.method, path: req.path, code: error.code, reason: error.message });
    }
    const details = error instanceof ValidationError ? error.details : undefined;
    sendError(res, status, error.code, error.message, details);
    return;
  }

  logger.error('Unhandled request error', error, { method: req.method, path: req.path });
  sendError(res, 500, 'internal_error', 'Internal server error');
}
