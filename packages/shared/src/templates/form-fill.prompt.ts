/**
 * Form Filling Prompt
 *
 * Prompts and structured-output schema for the LLM extraction arm.
 * The schema's properties are exactly the template's field names.
 */

import type { FieldTemplate } from '../types';
import type { StructuredOutputSchema } from '../providers/types';

export const FORM_FILL_SYSTEM_PROMPT = `You are an assistant that extracts trade document form fields from a user's free-form text.

EXTRACTION RULES:
1. Return a value for EVERY field listed, as a string.
2. Use an empty string when the text does not state the value. Do not guess.
3. Copy identifiers (invoice numbers, container numbers, HS codes) exactly as written.
4. Dates as YYYY-MM-DD. Currencies as ISO 4217 codes (USD, EUR). Incoterms as the three-letter code (FOB, CIF).
5. Keep units with weights, dimensions and quantities (e.g. "1,200 kg", "500 cartons").`;

/**
 * User prompt template with placeholders:
 * - {{fields}}: one line per field, "name (label): description"
 * - {{prompt}}: the user's text
 */
export const FORM_FILL_USER_PROMPT_TEMPLATE = `Given the following form fields:
{{fields}}

Extract values for each field. Missing fields are empty strings.

User text:
{{prompt}}`;

export function describeFields(template: FieldTemplate): string {
  return Object.entries(template)
    .map(([name, spec]) => {
      const label = spec.label || name;
      return spec.description ? `- ${name} (${label}): ${spec.description}` : `- ${name} (${label})`;
    })
    .join('\n');
}

export function buildFormFillUserPrompt(template: FieldTemplate, prompt: string): string {
  return FORM_FILL_USER_PROMPT_TEMPLATE.replace('{{fields}}', () => describeFields(template)).replace(
    '{{prompt}}',
    () => prompt
  );
}

/**
 * JSON Schema for OpenAI Structured Outputs: one required string per field.
 */
export function buildFormFillSchema(template: FieldTemplate): StructuredOutputSchema {
  const fieldNames = Object.keys(template);
  const properties: Record<string, { type: 'string'; description: string }> = {};

  for (const name of fieldNames) {
    const spec = template[name];
    properties[name] = {
      type: 'string',
      description: spec.description || spec.label || name,
    };
  }

  return {
    name: 'form_fill',
    schema: {
      type: 'object',
      additionalProperties: false,
      required: fieldNames,
      properties,
    },
  };
}
