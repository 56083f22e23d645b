/**
 * @efaktur/steps-normalizer
 *
 * Document normalization: media type detection, PDF text layers with OCR
 * fallback, and raster region collection.
 *
 * @packageDocumentation
 */

export { detectModality, resolveMediaType, sniffMediaType } from './detect-modality.js';
export {
  createDocumentNormalizer,
  type DocumentNormalizer,
  type DocumentNormalizerConfig,
  type NormalizeOptions,
} from './normalize-document.js';
