/**
 * Heuristic Field Extraction
 *
 * Deterministic extraction used when the LLM is disabled or fails. Each
 * field runs an ordered list of rules; a rule applies when the field's
 * name, label or type contains one of its words, and the first applicable
 * rule that finds a value wins. Fields no rule fills stay ''.
 *
 * Typed rules look just after the field's own label first, so two date
 * fields can pick up different dates, then across the whole prompt.
 */

import { logger } from '../logger';
import { hasAnyWord, isHsCodeField, profileField, type FieldProfile } from '../templates/fields';
import type { FieldTemplate, FilledForm } from '../types';
import {
  escapeRegExp,
  findAmount,
  findContainerNumber,
  findCurrency,
  findDimensions,
  findDocumentNumber,
  findEmail,
  findHsCode,
  findIncoterm,
  findIsoDate,
  findLabeledValue,
  findMarkedHsCode,
  findPhone,
  findQuantity,
  findVolume,
  findWeight,
} from './patterns';

export interface FieldRule {
  name: string;
  applies(field: FieldProfile): boolean;
  find(text: string, field: FieldProfile): string | null;
}

/** Characters after a label occurrence searched by the typed rules */
const LABEL_WINDOW = 80;

/**
 * Run `finder` on the text following each occurrence of the field's label,
 * then `wholeTextFinder` on the whole text.
 */
export function searchNearLabel(
  text: string,
  field: FieldProfile,
  finder: (segment: string) => string | null,
  wholeTextFinder: (text: string) => string | null = finder
): string | null {
  for (const label of field.labelVariants) {
    const labelPattern = new RegExp(escapeRegExp(label).replace(/ /g, '[\\s_-]+'), 'gi');
    for (const match of text.matchAll(labelPattern)) {
      const start = (match.index ?? 0) + match[0].length;
      const value = finder(text.slice(start, start + LABEL_WINDOW));
      if (value) return value;
    }
  }
  return wholeTextFinder(text);
}

/**
 * Document keyword -> phrases that introduce its number in free text.
 */
const DOCUMENT_KEYWORDS: Array<{ words: string[]; phrases: string[] }> = [
  { words: ['invoice', 'proforma'], phrases: ['commercial invoice', 'proforma invoice', 'invoice'] },
  { words: ['po'], phrases: ['purchase order', 'po'] },
  { words: ['purchase'], phrases: ['purchase order', 'po'] },
  { words: ['order'], phrases: ['purchase order', 'order', 'po'] },
  { words: ['booking'], phrases: ['booking'] },
  { words: ['contract'], phrases: ['contract'] },
  { words: ['bl', 'bol', 'lading'], phrases: ['bill of lading', 'b/l', 'bol', 'bl'] },
  { words: ['awb', 'waybill'], phrases: ['air waybill', 'awb'] },
  { words: ['reference', 'ref'], phrases: ['reference', 'ref'] },
];

const IDENTIFIER_WORDS = ['number', 'no', 'num', 'id', 'ref', 'reference'];

function documentPhrases(field: FieldProfile): string[] {
  const phrases: string[] = [];
  for (const { words, phrases: candidates } of DOCUMENT_KEYWORDS) {
    if (hasAnyWord(field, ...words)) {
      phrases.push(...candidates);
    }
  }
  return Array.from(new Set(phrases));
}

function isDocumentNumberField(field: FieldProfile): boolean {
  if (documentPhrases(field).length === 0) return false;
  return hasAnyWord(field, ...IDENTIFIER_WORDS) || field.name.toLowerCase() === 'reference';
}

/**
 * Ordered extraction rules. The labeled-value rule applies to every field
 * and runs last.
 */
export const FIELD_RULES: FieldRule[] = [
  {
    name: 'email',
    applies: (field) =>
      field.type === 'email' || hasAnyWord(field, 'email') || (hasAnyWord(field, 'e') && hasAnyWord(field, 'mail')),
    find: (text, field) => searchNearLabel(text, field, findEmail),
  },
  {
    name: 'phone',
    applies: (field) =>
      field.type === 'phone' || field.type === 'tel' || hasAnyWord(field, 'phone', 'tel', 'telephone', 'fax', 'mobile'),
    find: (text, field) => searchNearLabel(text, field, findPhone),
  },
  {
    name: 'hs_code',
    applies: isHsCodeField,
    find: (text, field) => searchNearLabel(text, field, findHsCode, findMarkedHsCode),
  },
  {
    name: 'container_number',
    applies: (field) =>
      hasAnyWord(field, 'container') && !hasAnyWord(field, 'type', 'size', 'count', 'quantity', 'qty'),
    find: (text, field) => searchNearLabel(text, field, findContainerNumber),
  },
  {
    name: 'document_number',
    applies: isDocumentNumberField,
    find: (text, field) => findDocumentNumber(text, documentPhrases(field)),
  },
  {
    name: 'date',
    applies: (field) => field.type === 'date' || hasAnyWord(field, 'date', 'etd', 'eta'),
    find: (text, field) => searchNearLabel(text, field, findIsoDate),
  },
  {
    name: 'currency',
    applies: (field) => field.type === 'currency' || hasAnyWord(field, 'currency'),
    find: (text, field) => searchNearLabel(text, field, findCurrency),
  },
  {
    name: 'incoterm',
    applies: (field) => field.type === 'incoterm' || hasAnyWord(field, 'incoterm', 'incoterms'),
    find: (text, field) => searchNearLabel(text, field, findIncoterm),
  },
  {
    name: 'weight',
    applies: (field) => hasAnyWord(field, 'weight', 'wt'),
    find: (text, field) => searchNearLabel(text, field, findWeight),
  },
  {
    name: 'dimensions',
    applies: (field) =>
      hasAnyWord(field, 'dimension', 'dimensions', 'size', 'measurement', 'measurements', 'volume', 'cbm'),
    find: (text, field) => {
      const volumeFirst = hasAnyWord(field, 'volume', 'cbm');
      const finders = volumeFirst ? [findVolume, findDimensions] : [findDimensions, findVolume];
      for (const finder of finders) {
        const value = searchNearLabel(text, field, finder);
        if (value) return value;
      }
      return null;
    },
  },
  {
    name: 'quantity',
    applies: (field) => field.type === 'quantity' || hasAnyWord(field, 'quantity', 'qty', 'packages'),
    find: (text, field) => searchNearLabel(text, field, findQuantity),
  },
  {
    name: 'amount',
    applies: (field) =>
      hasAnyWord(field, 'amount', 'total', 'value', 'price', 'cost') &&
      !hasAnyWord(field, 'weight', 'quantity', 'qty', 'currency'),
    find: (text, field) => searchNearLabel(text, field, findAmount),
  },
  {
    name: 'labeled_value',
    applies: () => true,
    find: (text, field) => findLabeledValue(text, field.labelVariants),
  },
];

export interface HeuristicExtraction {
  filled: FilledForm;
  /** Field name -> rule that produced its value */
  matchedRules: Record<string, string>;
}

/**
 * Extract a value for every template field. Pure: the same template and
 * prompt always give the same result.
 */
export function extractHeuristicallyDetailed(template: FieldTemplate, prompt: string): HeuristicExtraction {
  const filled: FilledForm = {};
  const matchedRules: Record<string, string> = {};

  for (const [name, spec] of Object.entries(template)) {
    const field = profileField(name, spec);
    filled[name] = '';

    for (const rule of FIELD_RULES) {
      if (!rule.applies(field)) continue;

      const value = rule.find(prompt, field);
      if (value) {
        filled[name] = value;
        matchedRules[name] = rule.name;
        break;
      }
    }
  }

  return { filled, matchedRules };
}

export function extractHeuristically(template: FieldTemplate, prompt: string): FilledForm {
  const { filled, matchedRules } = extractHeuristicallyDetailed(template, prompt);

  logger.debug('Heuristic extraction complete', {
    field_count: Object.keys(filled).length,
    filled_count: Object.keys(matchedRules).length,
    rules: matchedRules,
  });

  return filled;
}
