/**
 * Two-arm trial: run the primary source, and on any error, timeout or parse
 * failure run the deterministic secondary source. No retries.
 */

import { ProviderTimeoutError, errorMessage } from './errors';
import { fallbackCounter } from './metrics';
import { logger } from './logger';

export interface TrialArms<T> {
  /** Component name used in logs and the fallback metric */
  component: string;
  /** Null when the primary source is not configured at all */
  primary: (() => Promise<T>) | null;
  fallback: () => T | Promise<T>;
}

export interface TrialOutcome<T> {
  value: T;
  source: 'primary' | 'fallback';
  /** Set when the primary arm was attempted and failed */
  primaryError?: Error;
}

/**
 * Run `arms.primary`, falling back to `arms.fallback` on failure.
 * Errors from the fallback arm propagate to the caller.
 */
export async function runWithFallback<T>(arms: TrialArms<T>): Promise<TrialOutcome<T>> {
  if (!arms.primary) {
    logger.debug('Primary source not configured, using fallback', { component: arms.component });
    return { value: await arms.fallback(), source: 'fallback' };
  }

  let primaryError: Error;
  try {
    return { value: await arms.primary(), source: 'primary' };
  } catch (error) {
    primaryError = error instanceof Error ? error : new Error(String(error));
  }

  fallbackCounter.inc({ component: arms.component });
  logger.warn('Primary source failed, using fallback', {
    component: arms.component,
    reason: errorMessage(primaryError),
    error_name: primaryError.name,
  });

  return { value: await arms.fallback(), source: 'fallback', primaryError };
}

/**
 * Reject with ProviderTimeoutError if `promise` has not settled within `timeoutMs`.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  provider: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ProviderTimeoutError(provider, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
