/**
 * Trade Agent
 *
 * Fills a trade form in three steps: field extraction, autofill of the
 * fields extraction left empty from a similar past submission, then HS
 * classification of product descriptions into empty HS-code fields.
 */

import { errorMessage } from '../errors';
import type { FieldExtractionAgent } from '../extractors/field-extraction-agent';
import type { HsClassifier } from '../classification/hs-classifier';
import { logger } from '../logger';
import { isHsCodeField, isProductDescriptionField, profileField } from '../templates/fields';
import type { FieldTemplate, FilledForm } from '../types';

export interface TradeAgentOptions {
  /** Top suggestion is written only when its confidence is strictly above this */
  acceptanceThreshold: number;
  /** Suggestions requested per description */
  topN: number;
}

export interface TradeFillOptions {
  useAi?: boolean;
  autoClassifyHs?: boolean;
  /** Values from a similar past submission for fields extraction left empty */
  autofill?: Record<string, unknown> | null;
}

export interface HsFieldPair {
  descriptionField: string;
  hsField: string;
}

function fieldIndex(name: string): string | null {
  return name.match(/\d+/)?.[0] ?? null;
}

/**
 * Pair each product-description field with the HS-code field sharing its
 * numeric index ("item_1_description" with "item_1_hs_code"), else with the
 * first HS field not yet paired. Template order.
 */
export function pairHsFields(template: FieldTemplate): HsFieldPair[] {
  const profiles = Object.entries(template).map(([name, spec]) => profileField(name, spec));
  const descriptionFields = profiles.filter(isProductDescriptionField).map((field) => field.name);
  const hsFields = profiles.filter(isHsCodeField).map((field) => field.name);

  const unpaired = new Set(hsFields);
  const pairs: HsFieldPair[] = [];

  for (const descriptionField of descriptionFields) {
    const index = fieldIndex(descriptionField);
    const sameIndex =
      index !== null ? hsFields.find((name) => unpaired.has(name) && fieldIndex(name) === index) : undefined;
    const hsField = sameIndex ?? hsFields.find((name) => unpaired.has(name));
    if (!hsField) break;

    unpaired.delete(hsField);
    pairs.push({ descriptionField, hsField });
  }

  return pairs;
}

/**
 * Copy non-empty string values into fields that are still empty.
 * Returns the names of the fields filled.
 */
export function applyAutofill(
  filled: FilledForm,
  autofill: Record<string, unknown>
): string[] {
  const applied: string[] = [];
  for (const name of Object.keys(filled)) {
    if (filled[name] !== '') continue;

    const value = Object.hasOwn(autofill, name) ? autofill[name] : undefined;
    if (typeof value === 'string' && value.trim() !== '') {
      filled[name] = value;
      applied.push(name);
    }
  }
  return applied;
}

export class TradeAgent {
  constructor(
    private readonly extractor: FieldExtractionAgent,
    private readonly classifier: HsClassifier,
    private readonly options: TradeAgentOptions
  ) {}

  async fillTradeForm(
    template: FieldTemplate,
    prompt: string,
    options: TradeFillOptions = {}
  ): Promise<FilledForm> {
    const { useAi = true, autoClassifyHs = true, autofill = null } = options;

    const filled = { ...(await this.extractor.fill(template, prompt, useAi)) };

    if (autofill) {
      const applied = applyAutofill(filled, autofill);
      if (applied.length > 0) {
        logger.info('Autofilled fields from history', { fields: applied });
      }
    }

    if (autoClassifyHs) {
      await this.classifyHsFields(template, filled);
    }

    return filled;
  }

  private async classifyHsFields(template: FieldTemplate, filled: FilledForm): Promise<void> {
    for (const { descriptionField, hsField } of pairHsFields(template)) {
      const description = (filled[descriptionField] ?? '').trim();
      if (!description || (filled[hsField] ?? '').trim() !== '') continue;

      try {
        const [top] = await this.classifier.classify(description, this.options.topN);
        if (top && top.confidence > this.options.acceptanceThreshold) {
          filled[hsField] = top.code;
          logger.info('HS code auto-classified', {
            field: hsField,
            code: top.code,
            confidence: top.confidence,
          });
        } else {
          logger.info('HS suggestion below acceptance threshold', {
            field: hsField,
            code: top?.code,
            confidence: top?.confidence,
            threshold: this.options.acceptanceThreshold,
          });
        }
      } catch (error) {
        logger.warn('HS auto-classification failed', { field: hsField, error: errorMessage(error) });
      }
    }
  }
}
