/**
 * Image operations on top of sharp (libvips).
 *
 * Every operation re-encodes to PNG so the result is lossless for the next
 * stage.
 */

import sharp from 'sharp';
import type { ImageInfo, ImageMediaType, ImageProcessor, RasterImage } from '@efaktur/contracts';

/**
 * Raw pixel data as produced by PDF image decoders
 */
export interface RawPixels {
  data: Uint8Array;
  width: number;
  height: number;
  channels: 1 | 3 | 4;
}

export interface SharpImageProcessorOptions {
  /**
   * Images narrower than this are upscaled before OCR.
   * @default 1000
   */
  minOcrWidth?: number;
}

const FORMAT_MEDIA_TYPES: Readonly<Record<string, ImageMediaType>> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
};

async function toRasterImage(pipeline: sharp.Sharp): Promise<RasterImage> {
  const { data, info } = await pipeline.png().toBuffer({ resolveWithObject: true });
  return { data, mediaType: 'image/png', width: info.width, height: info.height };
}

/**
 * Encode raw pixels as a PNG raster image
 */
export function encodeRawPixels(pixels: RawPixels): Promise<RasterImage> {
  return toRasterImage(
    sharp(pixels.data, {
      raw: { width: pixels.width, height: pixels.height, channels: pixels.channels },
    }),
  );
}

export function createSharpImageProcessor(options: SharpImageProcessorOptions = {}): ImageProcessor {
  const minOcrWidth = options.minOcrWidth ?? 1000;

  return {
    name: 'sharp',

    async inspect(data): Promise<ImageInfo> {
      const metadata = await sharp(data).metadata();
      const mediaType = metadata.format === undefined ? undefined : FORMAT_MEDIA_TYPES[metadata.format];
      if (mediaType === undefined) {
        throw new Error(`Unsupported image encoding: ${metadata.format ?? 'unknown'}`);
      }
      if (metadata.width === undefined || metadata.height === undefined) {
        throw new Error('Image has no dimensions');
      }
      return { mediaType, width: metadata.width, height: metadata.height };
    },

    upscale(image, factor) {
      return toRasterImage(
        sharp(image.data).resize(Math.round(image.width * factor), Math.round(image.height * factor), {
          kernel: 'cubic',
        }),
      );
    },

    enhanceContrast(image) {
      return toRasterImage(sharp(image.data).grayscale().normalise());
    },

    prepareForOcr(image) {
      let pipeline = sharp(image.data).grayscale();
      if (image.width < minOcrWidth) {
        pipeline = pipeline.resize({ width: minOcrWidth, kernel: 'cubic' });
      }
      return toRasterImage(pipeline.sharpen());
    },
  };
}
