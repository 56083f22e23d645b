import jsQRModule from 'jsqr';
import sharp from 'sharp';
import type { QrDecoder } from '@efaktur/contracts';
import { throwIfCancelled } from '@efaktur/shared';

// Node hands over module.exports, Vitest may hand over the function itself
const jsQR: typeof jsQRModule.default =
  typeof jsQRModule === 'function' ? jsQRModule : jsQRModule.default;

/**
 * QR decoder on jsQR. Images are decoded to RGBA with sharp first.
 * jsQR finds at most one code per image.
 */
export function createJsQrDecoder(): QrDecoder {
  return {
    name: 'jsqr',

    async decode(image, options = {}) {
      throwIfCancelled(options.signal, 'qr');
      const { data, info } = await sharp(image.data)
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

      const pixels = new Uint8ClampedArray(data.buffer, data.byteOffset, data.byteLength);
      const code = jsQR(pixels, info.width, info.height, { inversionAttempts: 'attemptBoth' });
      return code === null ? [] : [code.data];
    },
  };
}
