import type { RawPixels } from '../image/sharp-image-processor.js';

/** pdf.js ImageKind values */
const GRAYSCALE_1BPP = 1;
const RGB_24BPP = 2;
const RGBA_32BPP = 3;

/**
 * Decoded image object as pdf.js stores it in `page.objs`
 */
export interface PdfImageObject {
  width: number;
  height: number;
  kind: number;
  data: Uint8Array | Uint8ClampedArray;
}

export function isPdfImageObject(value: unknown): value is PdfImageObject {
  if (typeof value !== 'object' || value === null) return false;
  const width: unknown = Reflect.get(value, 'width');
  const height: unknown = Reflect.get(value, 'height');
  const kind: unknown = Reflect.get(value, 'kind');
  const data: unknown = Reflect.get(value, 'data');
  return (
    typeof width === 'number' &&
    typeof height === 'number' &&
    typeof kind === 'number' &&
    (data instanceof Uint8Array || data instanceof Uint8ClampedArray)
  );
}

/**
 * Convert a pdf.js image object to raw pixels. 1-bit images are expanded to
 * 8-bit grayscale (set bits are white).
 *
 * @returns undefined for pixel layouts other than 1-bit gray, RGB and RGBA
 */
export function toRawPixels(image: PdfImageObject): RawPixels | undefined {
  const { width, height } = image;
  const data = new Uint8Array(image.data.buffer, image.data.byteOffset, image.data.byteLength);

  switch (image.kind) {
    case RGBA_32BPP:
      return data.length >= width * height * 4 ? { data, width, height, channels: 4 } : undefined;
    case RGB_24BPP:
      return data.length >= width * height * 3 ? { data, width, height, channels: 3 } : undefined;
    case GRAYSCALE_1BPP: {
      const rowBytes = (width + 7) >> 3;
      if (data.length < rowBytes * height) return undefined;
      const gray = new Uint8Array(width * height);
      for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
          const byte = data[y * rowBytes + (x >> 3)] ?? 0;
          gray[y * width + x] = byte & (0x80 >> (x & 7)) ? 0xff : 0x00;
        }
      }
      return { data: gray, width, height, channels: 1 };
    }
    default:
      return undefined;
  }
}
