/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for API requests and form templates.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { AnySchemaObject, ValidateFunction } from 'ajv';
import { ValidationError } from './errors';
import type {
  ClassifyRequest,
  CreateTemplateRequest,
  FieldTemplate,
  FillRequest,
} from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

function loadSchema(schemaName: string): AnySchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

/**
 * Compile a schema on first use and keep the compiled validator.
 */
function lazyValidator<T>(schemaName: string): () => ValidateFunction<T> {
  let compiled: ValidateFunction<T> | null = null;
  return () => {
    if (!compiled) {
      compiled = ajv.compile<T>(loadSchema(schemaName));
    }
    return compiled;
  };
}

const fillRequestValidator = lazyValidator<FillRequest>('fill_request.schema.json');
const classifyRequestValidator = lazyValidator<ClassifyRequest>('classify_request.schema.json');
const createTemplateValidator = lazyValidator<CreateTemplateRequest>('create_template_request.schema.json');
const fieldTemplateValidator = lazyValidator<FieldTemplate>('field_template.schema.json');

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function formatErrors<T>(validate: ValidateFunction<T>): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

function parseWith<T>(validate: ValidateFunction<T>, data: unknown, label: string): T {
  if (validate(data)) {
    return data;
  }
  const errors = formatErrors(validate);
  throw new ValidationError(`Invalid ${label}: ${errors.join('; ')}`, errors);
}

/**
 * Validate and narrow a POST /api/fill body
 */
export function parseFillRequest(data: unknown): FillRequest {
  return parseWith(fillRequestValidator(), data, 'fill request');
}

/**
 * Validate and narrow a POST /api/classify-hs body
 */
export function parseClassifyRequest(data: unknown): ClassifyRequest {
  return parseWith(classifyRequestValidator(), data, 'classify request');
}

/**
 * Validate and narrow a POST /api/templates body
 */
export function parseCreateTemplateRequest(data: unknown): CreateTemplateRequest {
  return parseWith(createTemplateValidator(), data, 'template request');
}

/**
 * Validate and narrow a field template read from disk or a request
 */
export function parseFieldTemplate(data: unknown): FieldTemplate {
  return parseWith(fieldTemplateValidator(), data, 'field template');
}

/**
 * Validate a field template without throwing
 */
export function validateFieldTemplate(data: unknown): ValidationResult {
  const validate = fieldTemplateValidator();
  if (validate(data)) {
    return { valid: true };
  }
  return { valid: false, errors: formatErrors(validate) };
}
