/**
 * Media types accepted for upload
 */
export type SupportedMediaType = 'application/pdf' | 'image/jpeg' | 'image/png';

/**
 * Encodings a raster image payload may carry
 */
export type ImageMediaType = 'image/png' | 'image/jpeg';

/**
 * Document modality: a page-structured document with a text layer, or a
 * photographed/scanned raster image.
 */
export type Modality = 'structured' | 'raster';

/**
 * Encoded image bytes plus pixel dimensions.
 */
export interface RasterImage {
  readonly data: Uint8Array;
  readonly mediaType: ImageMediaType;
  readonly width: number;
  readonly height: number;
}

/**
 * Placement of an embedded image on its page, in PDF user-space units
 */
export interface RegionPosition {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * Where a raster region came from
 */
export type RegionProvenance =
  | {
      readonly kind: 'embedded';
      readonly pageIndex: number;
      /** Order of the image on its page */
      readonly imageIndex: number;
      readonly position?: RegionPosition;
    }
  | {
      /** Whole-page render used for OCR of text-less pages; never scanned for QR codes */
      readonly kind: 'page-render';
      readonly pageIndex: number;
    }
  | {
      readonly kind: 'standalone';
    };

/**
 * An image payload with its provenance. Request-scoped; never persisted.
 */
export interface RasterRegion {
  readonly image: RasterImage;
  readonly provenance: RegionProvenance;
}

/**
 * Which path produced the normalized text
 */
export type TextSource = 'text-layer' | 'ocr' | 'mixed' | 'none';

/**
 * Output of the document normalizer
 */
export interface NormalizedDocument {
  readonly modality: Modality;
  readonly mediaType: SupportedMediaType;
  /** Plain-text rendering; pages separated by a blank line */
  readonly plainText: string;
  /** Raster regions in document order */
  readonly rasterRegions: readonly RasterRegion[];
  readonly textSource: TextSource;
  readonly pageCount: number;
}

/**
 * A document submitted for validation
 */
export interface DocumentInput {
  readonly content: Uint8Array;
  /** Declared media type (e.g. from the multipart part header) */
  readonly mediaType?: string;
  /** Original file name, used as a fallback for media type detection */
  readonly fileName?: string;
}
