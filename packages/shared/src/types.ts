/**
 * Shared TypeScript Types
 *
 * Types for the trade form pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Templates & Forms
// ============================================================================

export interface FieldSpec {
  label?: string;
  type?: string;
  description?: string;
}

/** Field name -> field metadata. Key order is display order. */
export type FieldTemplate = Record<string, FieldSpec>;

/** Field name -> extracted value ('' when nothing was found). */
export type FilledForm = Record<string, string>;

export interface TemplateSummary {
  name: string;
  fields: string[];
}

// ============================================================================
// HS Classification
// ============================================================================

export interface CorpusEntry {
  code: string;
  description: string;
}

export interface ClassificationResult {
  code: string;
  description: string;
  /** 0..1, never increasing along a returned list */
  confidence: number;
  reasoning?: string;
}

export type ClassificationMethod = 'embedding' | 'keyword' | 'none';

// ============================================================================
// Extraction
// ============================================================================

export type ExtractionMethod = 'llm' | 'heuristic';

export interface FillOutcome {
  filled: FilledForm;
  method: ExtractionMethod;
  /** Why the LLM arm was not used, when it was requested */
  fallbackReason?: string;
}

// ============================================================================
// History
// ============================================================================

export type EmbeddingVector = number[];

export interface NewSubmission {
  templateName: string;
  inputText: string;
  filledForm: FilledForm;
}

export interface SubmissionRecord extends NewSubmission {
  id: string;
  createdAt: string;
  embedding: EmbeddingVector | null;
}

// ============================================================================
// API Types
// ============================================================================

export interface FillRequest {
  template: string;
  prompt: string;
  use_ai?: boolean;
  use_db?: boolean;
  save_to_db?: boolean;
  auto_classify_hs?: boolean;
}

export interface FillResponse {
  filled: FilledForm;
  from_db: boolean;
  template: string;
}

export interface ClassifyRequest {
  product_description: string;
  top_n?: number;
}

export interface ClassifyResponse {
  suggestions: ClassificationResult[];
  count: number;
  product_description: string;
}

export interface CreateTemplateRequest {
  name: string;
  template: FieldTemplate;
}

export interface HistoryEntry {
  id: string;
  template: string;
  input_text: string;
  data: FilledForm;
  timestamp: string;
}

export interface HistoryResponse {
  history: HistoryEntry[];
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
    details?: string[];
  };
}
