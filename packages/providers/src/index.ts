/**
 * @efaktur/providers
 *
 * Concrete capability providers for the validation pipeline.
 *
 * @packageDocumentation
 */

export { createDefaultHttpClient } from './http/fetch-http-client.js';
export {
  createSharpImageProcessor,
  encodeRawPixels,
  type RawPixels,
  type SharpImageProcessorOptions,
} from './image/sharp-image-processor.js';
export { createPdfjsDocumentReader, type PdfjsDocumentReaderOptions } from './pdf/pdfjs-document-reader.js';
export {
  createTesseractRecognizer,
  type ManagedTextRecognizer,
  type TesseractRecognizerOptions,
} from './ocr/tesseract-recognizer.js';
export {
  BUNDLED_LANGUAGE_PACKAGES,
  BUNDLED_MODEL_DIRECTORY,
  bundledLanguageFile,
  type LanguageData,
} from './ocr/language-data.js';
export { createJsQrDecoder } from './qr/jsqr-decoder.js';
