import type { ImageMediaType, RasterImage, RegionPosition } from '../core/document.js';

/**
 * Options accepted by every capability call
 */
export interface ProviderCallOptions {
  /** Aborts the call at the provider's next opportunity */
  signal?: AbortSignal;
}

/**
 * An image embedded in a structured document page
 */
export interface EmbeddedImage {
  readonly image: RasterImage;
  readonly position?: RegionPosition;
}

/**
 * One page of an opened structured document
 */
export interface DocumentPage {
  /** Zero-based page index */
  readonly index: number;
  /** Native text layer; empty when the page has none */
  readonly text: string;
  /** Embedded images in drawing order */
  readonly images: readonly EmbeddedImage[];
  /**
   * Rasterize the page for OCR.
   * Resolves to undefined when the provider cannot produce a render.
   */
  render(options?: ProviderCallOptions): Promise<RasterImage | undefined>;
}

/**
 * An opened structured document. Must be closed by the caller.
 */
export interface StructuredDocument {
  readonly pages: readonly DocumentPage[];
  close(): Promise<void>;
}

/**
 * Text-layer reader for page-structured documents (PDF).
 *
 * `open` rejects when the byte stream cannot be opened at all.
 */
export interface DocumentReader {
  readonly name: string;
  open(content: Uint8Array, options?: ProviderCallOptions): Promise<StructuredDocument>;
}

/**
 * Image-to-text recognizer (OCR)
 */
export interface TextRecognizer {
  readonly name: string;
  recognize(image: RasterImage, options?: ProviderCallOptions): Promise<string>;
}

/**
 * Basic facts about an encoded image
 */
export interface ImageInfo {
  readonly mediaType: ImageMediaType;
  readonly width: number;
  readonly height: number;
}

/**
 * Image decoding and pre-processing operations
 */
export interface ImageProcessor {
  readonly name: string;
  /** Rejects when the bytes are not a decodable image */
  inspect(data: Uint8Array): Promise<ImageInfo>;
  upscale(image: RasterImage, factor: number): Promise<RasterImage>;
  /** Grayscale with contrast stretched to the full range */
  enhanceContrast(image: RasterImage): Promise<RasterImage>;
  /** Grayscale and sharpen ahead of text recognition */
  prepareForOcr(image: RasterImage): Promise<RasterImage>;
}

/**
 * Barcode/QR decoder. Resolves to the decoded payloads, empty when none.
 */
export interface QrDecoder {
  readonly name: string;
  decode(image: RasterImage, options?: ProviderCallOptions): Promise<string[]>;
}

/**
 * Fetches the authoritative record behind a lookup URL.
 *
 * Rejects with NetworkError, HttpError, MalformedResponseError or
 * CancelledError.
 */
export interface RecordFetcher {
  readonly name: string;
  fetch(url: string, options?: ProviderCallOptions): Promise<Uint8Array>;
}
