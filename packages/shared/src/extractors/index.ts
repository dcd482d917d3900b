/**
 * Form field extraction: the LLM arm, the heuristic rules and the agent
 * that chooses between them.
 */

export { FieldExtractionAgent } from './field-extraction-agent';
export {
  extractHeuristically,
  extractHeuristicallyDetailed,
  searchNearLabel,
  FIELD_RULES,
  type FieldRule,
  type HeuristicExtraction,
} from './heuristic-extractor';
export { extractWithLlm, parseJsonObject, normalizeLlmFields } from './llm-extraction';
export {
  findEmail,
  findPhone,
  findIsoDate,
  findHsCode,
  findMarkedHsCode,
  findContainerNumber,
  findCurrency,
  findIncoterm,
  findWeight,
  findDimensions,
  findVolume,
  findQuantity,
  findAmount,
  findDocumentNumber,
  findLabeledValue,
  CURRENCY_CODES,
  INCOTERMS,
} from './patterns';
