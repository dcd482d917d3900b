/**
 * Trade Document Extraction Patterns
 *
 * Regular expressions and finders for the values trade forms ask for:
 * contact details, dates, tariff codes, container numbers, commercial terms
 * and measured quantities. Every finder returns the first match in the text
 * or null.
 */

export const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;

/** Broad phone candidate; digit count is checked afterwards */
const PHONE_CANDIDATE_PATTERN = /\+?[\d(][\d\s().-]{5,}\d/g;

export const ISO_DATE_PATTERN = /\b(\d{4})-(\d{2})-(\d{2})\b/g;

/**
 * HS code after an explicit label: "HS code: 8518.30", "HTS 8518300000".
 */
const LABELED_HS_CODE_PATTERN =
  /\b(?:hs|hts|tariff|harmoni[sz]ed)(?:\s*(?:code|no\.?|number|#))?\s*[:#-]?\s*(\d{4}(?:\.\d{2}){1,3}|\d{6,10})\b/i;

const DOTTED_HS_CODE_PATTERN = /\b\d{4}\.\d{2}(?:\.\d{2}){0,2}\b/;

const PLAIN_HS_CODE_PATTERN = /(?<![+\d])\b\d{6,10}\b/;

/**
 * ISO 6346 container number: owner code + category letter, serial and check digit.
 * Examples: MSCU1234567, TGHU 7654321
 */
const CONTAINER_PATTERN = /\b([A-Z]{4})\s?(\d{7})\b/;

export const CURRENCY_CODES = [
  'USD', 'EUR', 'GBP', 'JPY', 'CNY', 'RMB', 'HKD', 'SGD', 'INR', 'KRW',
  'CAD', 'AUD', 'NZD', 'CHF', 'SEK', 'NOK', 'DKK', 'PLN', 'CZK', 'HUF',
  'TRY', 'RUB', 'AED', 'SAR', 'ZAR', 'MXN', 'BRL', 'ARS', 'CLP', 'THB',
  'VND', 'IDR', 'MYR', 'PHP', 'TWD', 'ILS', 'EGP', 'NGN', 'KES', 'PKR',
];

const CURRENCY_CODE_PATTERN = new RegExp(`\\b(${CURRENCY_CODES.join('|')})\\b`);

const CURRENCY_SYMBOLS: Array<[RegExp, string]> = [
  [/US\$/, 'USD'],
  [/€/, 'EUR'],
  [/£/, 'GBP'],
  [/¥/, 'JPY'],
  [/\$/, 'USD'],
];

/** Incoterms 2020, plus DAT from the 2010 rules which still shows up on forms */
export const INCOTERMS = ['EXW', 'FCA', 'FAS', 'FOB', 'CFR', 'CIF', 'CPT', 'CIP', 'DAP', 'DPU', 'DDP', 'DAT'];

const LABELED_INCOTERM_PATTERN = /\bincoterms?(?:\s*20\d{2})?\s*(?::|-|–)?\s*([A-Za-z]{3})\b/i;

const INCOTERM_PATTERN = new RegExp(`\\b(${INCOTERMS.join('|')})\\b`);

const NUMBER = String.raw`(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?`;

const WEIGHT_PATTERN = new RegExp(
  `${NUMBER}\\s*(?:kgs?|kilograms?|kilos?|lbs?|pounds?|tonnes?|tons?|mt|grams?|g)\\b`,
  'i'
);

const DIMENSION_VALUE = String.raw`\d+(?:\.\d+)?`;

const DIMENSIONS_PATTERN = new RegExp(
  `${DIMENSION_VALUE}\\s*[x×*]\\s*${DIMENSION_VALUE}(?:\\s*[x×*]\\s*${DIMENSION_VALUE})?(?:\\s*(?:cm|mm|m|in|inches|ft)\\b)?`,
  'i'
);

const VOLUME_PATTERN = new RegExp(`${NUMBER}\\s*(?:cbm|m3|m³|cubic\\s+met(?:er|re)s?)`, 'i');

const QUANTITY_PATTERN = new RegExp(
  `${NUMBER}\\s*(?:units?|pcs|pieces?|cartons?|ctns?|boxes|box|pallets?|sets?|pairs?|dozens?|bags?|drums?|rolls?|bottles?|cases?|packages?)\\b`,
  'i'
);

const AMOUNT_PREFIXED_PATTERN = new RegExp(
  `(?:\\b(?:${CURRENCY_CODES.join('|')})\\s?|US\\$\\s?|[$€£¥]\\s?)${NUMBER}`
);

const AMOUNT_SUFFIXED_PATTERN = new RegExp(`${NUMBER}\\s?(?:${CURRENCY_CODES.join('|')})\\b`);

/**
 * Identifier after a document keyword: letters, digits, "-" and "/", at least one digit.
 */
const DOCUMENT_ID = String.raw`([A-Z0-9][A-Z0-9/-]*\d[A-Z0-9/-]*)`;

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function findEmail(text: string): string | null {
  return text.match(EMAIL_PATTERN)?.[0] ?? null;
}

/**
 * Phone numbers: 7 to 15 digits, optional leading "+", grouping by spaces,
 * dots, dashes or parentheses. ISO dates are not phone numbers.
 */
export function findPhone(text: string): string | null {
  for (const match of text.matchAll(PHONE_CANDIDATE_PATTERN)) {
    const candidate = match[0].trim();
    const digits = candidate.replace(/\D/g, '').length;
    if (digits < 7 || digits > 15) continue;
    if (/^\d{4}-\d{2}-\d{2}$/.test(candidate)) continue;
    return candidate;
  }
  return null;
}

/**
 * First valid calendar-looking ISO date (month 01-12, day 01-31).
 */
export function findIsoDate(text: string): string | null {
  for (const match of text.matchAll(ISO_DATE_PATTERN)) {
    const month = parseInt(match[2], 10);
    const day = parseInt(match[3], 10);
    if (month >= 1 && month <= 12 && day >= 1 && day <= 31) {
      return match[0];
    }
  }
  return null;
}

/**
 * HS code that is recognisable on its own: labeled ("HS code 851830") or
 * dotted ("8518.30"). Bare digit runs are left out, since order, account and
 * phone numbers look the same.
 */
export function findMarkedHsCode(text: string): string | null {
  const labeled = text.match(LABELED_HS_CODE_PATTERN);
  if (labeled) return labeled[1];

  return text.match(DOTTED_HS_CODE_PATTERN)?.[0] ?? null;
}

/**
 * HS code of 6-10 digits: labeled first, then dotted, then plain digits.
 * Only for text already known to follow an HS label.
 */
export function findHsCode(text: string): string | null {
  return findMarkedHsCode(text) ?? text.match(PLAIN_HS_CODE_PATTERN)?.[0] ?? null;
}

/**
 * Container number, normalized without the inner space.
 */
export function findContainerNumber(text: string): string | null {
  const match = text.match(CONTAINER_PATTERN);
  return match ? `${match[1]}${match[2]}` : null;
}

/**
 * ISO currency code, else the code for the first currency symbol.
 */
export function findCurrency(text: string): string | null {
  const code = text.match(CURRENCY_CODE_PATTERN);
  if (code) return code[1];

  for (const [symbol, currency] of CURRENCY_SYMBOLS) {
    if (symbol.test(text)) return currency;
  }
  return null;
}

/**
 * Incoterm after an "Incoterms" label (any case), else the first uppercase rule code.
 * "Incoterms: FOB San Francisco" -> "FOB"
 */
export function findIncoterm(text: string): string | null {
  const labeled = text.match(LABELED_INCOTERM_PATTERN);
  if (labeled) {
    const term = labeled[1].toUpperCase();
    if (INCOTERMS.includes(term)) return term;
  }

  return text.match(INCOTERM_PATTERN)?.[1] ?? null;
}

export function findWeight(text: string): string | null {
  const match = text.match(WEIGHT_PATTERN);
  return match ? collapseWhitespace(match[0]) : null;
}

export function findDimensions(text: string): string | null {
  const match = text.match(DIMENSIONS_PATTERN);
  return match ? collapseWhitespace(match[0]) : null;
}

export function findVolume(text: string): string | null {
  const match = text.match(VOLUME_PATTERN);
  return match ? collapseWhitespace(match[0]) : null;
}

export function findQuantity(text: string): string | null {
  const match = text.match(QUANTITY_PATTERN);
  return match ? collapseWhitespace(match[0]) : null;
}

/**
 * Money amount marked with a currency code or symbol: "USD 12,500.00", "$4,000", "900 EUR".
 */
export function findAmount(text: string): string | null {
  const prefixed = text.match(AMOUNT_PREFIXED_PATTERN);
  if (prefixed) return collapseWhitespace(prefixed[0]);

  const suffixed = text.match(AMOUNT_SUFFIXED_PATTERN);
  return suffixed ? collapseWhitespace(suffixed[0]) : null;
}

/**
 * Identifier introduced by a document keyword, e.g. "Invoice CI-2025-001",
 * "Invoice No. CI-2025-001", "PO#4500123".
 */
export function findDocumentNumber(text: string, keywords: string[]): string | null {
  for (const keyword of keywords) {
    const pattern = new RegExp(
      `\\b${escapeRegExp(keyword).replace(/ /g, '\\s+')}\\b\\s*(?:number|no\\.?|num|#|ref(?:erence)?)?\\s*[:#.-]?\\s*${DOCUMENT_ID}`,
      'i'
    );
    const match = text.match(pattern);
    if (match) return match[1];
  }
  return null;
}

/** Start of another "Some Label:" inside a captured value */
const NEXT_LABEL_PATTERN = /\s+[A-Za-z][A-Za-z ]{0,30}:\s/;

const MAX_LABELED_VALUE_LENGTH = 200;

/**
 * Value written as "Label: value" or "Label - value" (case-insensitive).
 * The value ends at a newline, ";" or "|", or before the next "Label:".
 */
export function findLabeledValue(text: string, labels: string[]): string | null {
  for (const label of labels) {
    const labelPattern = escapeRegExp(label).replace(/ /g, '[\\s_-]+');
    const pattern = new RegExp(`(?:^|[^A-Za-z0-9])${labelPattern}\\s*(?::|\\s[-–]\\s)\\s*([^\\n;|]+)`, 'i');
    const match = text.match(pattern);
    if (!match) continue;

    let value = match[1];
    const nextLabel = value.search(NEXT_LABEL_PATTERN);
    if (nextLabel >= 0) {
      value = value.slice(0, nextLabel);
    }

    value = value.trim().replace(/[,.]+$/, '').trim();
    if (value) {
      return value.slice(0, MAX_LABELED_VALUE_LENGTH);
    }
  }
  return null;
}
