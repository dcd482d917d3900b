/**
 * Field templates: profiling of template fields and the LLM prompt built
 * from a template.
 */

export {
  profileField,
  splitWords,
  hasAnyWord,
  isHsCodeField,
  isProductDescriptionField,
  HS_FIELD_NAMES,
  PRODUCT_DESCRIPTION_NAMES,
  type FieldProfile,
} from './fields';
export {
  FORM_FILL_SYSTEM_PROMPT,
  FORM_FILL_USER_PROMPT_TEMPLATE,
  describeFields,
  buildFormFillUserPrompt,
  buildFormFillSchema,
} from './form-fill.prompt';
