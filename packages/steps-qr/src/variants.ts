import type { ImageProcessor, RasterImage } from '@efaktur/contracts';

/**
 * One image pre-processing step tried before decoding
 */
export interface QrVariant {
  readonly name: string;
  prepare(image: RasterImage, processor: ImageProcessor): Promise<RasterImage>;
}

/**
 * Variants in priority order. Small embedded QR images often decode only
 * after upscaling; low-contrast scans after contrast stretching.
 */
export const DEFAULT_QR_VARIANTS: readonly QrVariant[] = [
  {
    name: 'original',
    prepare: (image) => Promise.resolve(image),
  },
  {
    name: 'upscale-2x',
    prepare: (image, processor) => processor.upscale(image, 2),
  },
  {
    name: 'grayscale-contrast',
    prepare: (image, processor) => processor.enhanceContrast(image),
  },
];
