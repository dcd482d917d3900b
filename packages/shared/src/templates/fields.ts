/**
 * Field Profiles
 *
 * Reduces a template field to the words its name, label and type are made
 * of, which is what every rule keys on.
 */

import type { FieldSpec } from '../types';

export interface FieldProfile {
  name: string;
  spec: FieldSpec;
  /** Words of the field name and label, lowercase */
  words: Set<string>;
  /** Words of the field name only, in order */
  nameWords: string[];
  /** Lowercase field type, '' when absent */
  type: string;
  /** Phrases the field may be introduced by in free text, longest first */
  labelVariants: string[];
}

/** Trailing words dropped to form a shorter label ("shipper_name" -> "shipper") */
const GENERIC_SUFFIXES = new Set(['name', 'number', 'no', 'id', 'details', 'info']);

export const HS_FIELD_NAMES = new Set(['hs_code', 'hts_code', 'harmonized_code', 'tariff_code']);

export const PRODUCT_DESCRIPTION_NAMES = new Set([
  'description',
  'description_of_goods',
  'goods_description',
  'product_name',
  'product',
  'commodity',
]);

/**
 * "grossWeight_kg" -> ["gross", "weight", "kg"]
 */
export function splitWords(text: string): string[] {
  return text
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 0);
}

export function profileField(name: string, spec: FieldSpec): FieldProfile {
  const nameWords = splitWords(name);
  const labelWords = spec.label ? splitWords(spec.label) : [];

  const variants: string[] = [];
  if (spec.label && spec.label.trim()) {
    variants.push(spec.label.trim().toLowerCase());
  }
  variants.push(nameWords.join(' '));
  if (nameWords.length > 1 && GENERIC_SUFFIXES.has(nameWords[nameWords.length - 1])) {
    variants.push(nameWords.slice(0, -1).join(' '));
  }

  const labelVariants = Array.from(new Set(variants.filter((v) => v.length > 0))).sort(
    (a, b) => b.length - a.length
  );

  return {
    name,
    spec,
    words: new Set([...nameWords, ...labelWords]),
    nameWords,
    type: (spec.type || '').trim().toLowerCase(),
    labelVariants,
  };
}

export function hasAnyWord(field: FieldProfile, ...words: string[]): boolean {
  return words.some((word) => field.words.has(word));
}

/**
 * Fields that hold an HS / HTS tariff code.
 */
export function isHsCodeField(field: FieldProfile): boolean {
  if (field.type === 'hs_code' || field.type === 'hts_code') return true;
  if (HS_FIELD_NAMES.has(field.name.toLowerCase())) return true;
  if (hasAnyWord(field, 'hscode', 'htscode')) return true;
  return (
    hasAnyWord(field, 'hs', 'hts', 'tariff', 'harmonized', 'harmonised') &&
    hasAnyWord(field, 'code', 'number', 'no', 'classification')
  );
}

/**
 * Fields that describe the goods being shipped.
 */
export function isProductDescriptionField(field: FieldProfile): boolean {
  if (isHsCodeField(field)) return false;
  if (field.type === 'product_description') return true;

  const lowerName = field.name.toLowerCase();
  if (PRODUCT_DESCRIPTION_NAMES.has(lowerName)) return true;
  if (lowerName.includes('product') && lowerName.includes('desc')) return true;

  const label = (field.spec.label || '').toLowerCase();
  return /product description|description of goods|goods description/.test(label);
}
