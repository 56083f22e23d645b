/**
 * @efaktur/steps-qr
 *
 * Finds the authority lookup URL encoded in a document's QR code.
 *
 * @packageDocumentation
 */

export { DEFAULT_QR_VARIANTS, type QrVariant } from './variants.js';
export {
  createQrLocator,
  isScannableRegion,
  type QrLocator,
  type QrLocatorConfig,
  type QrSearchResult,
} from './locate-qr.js';
