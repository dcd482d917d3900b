/**
 * Field Extraction Agent
 *
 * Fills a template from free text. The LLM arm runs first when it is enabled
 * for the request and a completion client is configured; any failure there
 * (network, timeout, malformed reply) hands over to the heuristic extractor.
 */

import { ValidationError, errorMessage } from '../errors';
import { runWithFallback, withTimeout } from '../fallback';
import { logger } from '../logger';
import { extractionsCounter } from '../metrics';
import type { CompletionClient } from '../providers/types';
import type { ExtractionMethod, FieldTemplate, FillOutcome, FilledForm } from '../types';
import { extractHeuristically } from './heuristic-extractor';
import { extractWithLlm } from './llm-extraction';

export class FieldExtractionAgent {
  constructor(
    private readonly completion: CompletionClient | null,
    private readonly llmTimeoutMs: number
  ) {}

  get aiEnabled(): boolean {
    return this.completion !== null;
  }

  async fill(template: FieldTemplate, prompt: string, useAi = true): Promise<FilledForm> {
    const outcome = await this.fillDetailed(template, prompt, useAi);
    return outcome.filled;
  }

  /**
   * Like fill, also reporting which arm produced the values.
   * The result always has exactly the template's fields.
   */
  async fillDetailed(template: FieldTemplate, prompt: string, useAi = true): Promise<FillOutcome> {
    if (!prompt || !prompt.trim()) {
      throw new ValidationError('prompt is required');
    }
    if (Object.keys(template).length === 0) {
      throw new ValidationError('template has no fields');
    }

    const completion = useAi ? this.completion : null;

    const outcome = await runWithFallback({
      component: 'field_extraction',
      primary: completion
        ? () => withTimeout(extractWithLlm(completion, template, prompt), this.llmTimeoutMs, 'llm')
        : null,
      fallback: () => extractHeuristically(template, prompt),
    });

    const method: ExtractionMethod = outcome.source === 'primary' ? 'llm' : 'heuristic';
    extractionsCounter.inc({ method });

    const filledCount = Object.values(outcome.value).filter((value) => value !== '').length;
    logger.info('Form extraction complete', {
      method,
      field_count: Object.keys(template).length,
      filled_count: filledCount,
    });

    if (outcome.primaryError) {
      return { filled: outcome.value, method, fallbackReason: errorMessage(outcome.primaryError) };
    }
    if (useAi && !this.completion) {
      return { filled: outcome.value, method, fallbackReason: 'LLM not configured' };
    }
    return { filled: outcome.value, method };
  }
}
