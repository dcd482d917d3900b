import { errorMessage } from '../errors';
import { logger } from '../logger';
import type { SubmissionRecord } from '../types';
import type { HistoryStore } from './types';

/**
 * The past submission for the same template most similar to `prompt`, or
 * null when there is none or the store cannot be searched.
 */
export async function findAutofillSource(
  store: HistoryStore,
  prompt: string,
  templateName: string
): Promise<SubmissionRecord | null> {
  try {
    const [best] = await store.findSimilar(prompt, 1, templateName);
    return best ?? null;
  } catch (error) {
    logger.warn('History lookup failed, continuing without autofill', {
      store: store.kind,
      error: errorMessage(error),
    });
    return null;
  }
}
