/**
 * LLM Form Extraction
 *
 * Sends the template and the user's text to the completion client and reads
 * the reply back as a field map restricted to the template's fields.
 */

import { MalformedResponseError } from '../errors';
import { logger } from '../logger';
import type { CompletionClient } from '../providers/types';
import {
  FORM_FILL_SYSTEM_PROMPT,
  buildFormFillSchema,
  buildFormFillUserPrompt,
} from '../templates/form-fill.prompt';
import type { FieldTemplate, FilledForm } from '../types';

/**
 * Maximum characters of user text sent to the model.
 */
const MAX_PROMPT_CHARS = 20000;

/** Upper bound on completion tokens for one form */
const MAX_COMPLETION_TOKENS = 2000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the reply as a JSON object: the whole text first, then the first
 * `{...}` block inside it (models sometimes wrap JSON in prose or fences).
 */
export function parseJsonObject(raw: string): Record<string, unknown> {
  const candidates = [raw.trim()];
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start >= 0 && end > start) {
    candidates.push(raw.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      continue;
    }
    if (isRecord(parsed)) return parsed;
    throw new MalformedResponseError('LLM response is not a JSON object', raw);
  }

  throw new MalformedResponseError('LLM response is not valid JSON', raw);
}

function toFieldValue(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * Keep only template fields, in template order; missing fields become ''.
 */
export function normalizeLlmFields(template: FieldTemplate, data: Record<string, unknown>): FilledForm {
  const filled: FilledForm = {};
  for (const name of Object.keys(template)) {
    filled[name] = Object.hasOwn(data, name) ? toFieldValue(data[name]) : '';
  }
  return filled;
}

/**
 * Extract template fields with the LLM.
 *
 * @throws ProviderUnavailableError on network, credential or provider failure
 * @throws MalformedResponseError when the reply is not a JSON object
 */
export async function extractWithLlm(
  client: CompletionClient,
  template: FieldTemplate,
  prompt: string
): Promise<FilledForm> {
  const text = prompt.length > MAX_PROMPT_CHARS ? prompt.slice(0, MAX_PROMPT_CHARS) : prompt;
  if (text.length < prompt.length) {
    logger.warn('Prompt truncated for LLM extraction', {
      original_chars: prompt.length,
      sent_chars: text.length,
    });
  }

  const raw = await client.complete({
    systemPrompt: FORM_FILL_SYSTEM_PROMPT,
    userPrompt: buildFormFillUserPrompt(template, text),
    responseSchema: buildFormFillSchema(template),
    maxTokens: MAX_COMPLETION_TOKENS,
  });

  const data = parseJsonObject(raw);
  const filled = normalizeLlmFields(template, data);

  const unknownKeys = Object.keys(data).filter((key) => !Object.hasOwn(template, key));
  if (unknownKeys.length > 0) {
    logger.debug('Dropped fields not in template', { fields: unknownKeys });
  }

  return filled;
}
