/**
 * @efaktur/steps-extractor
 *
 * Extracts the eight e-Faktur fields from normalized document text.
 *
 * @packageDocumentation
 */

export { cleanOcrText, OCR_CORRECTIONS } from './clean-text.js';
export { splitPartySections, type PartySections } from './sections.js';
export {
  DEFAULT_EXTRACTION_RULES,
  type ExtractionRule,
  type AnyExtractionRule,
  type RuleScope,
} from './rules.js';
export {
  extractFields,
  type ExtractionResult,
  type ExtractionTrace,
  type ExtractFieldsOptions,
  type FieldTrace,
} from './extract-fields.js';
