/**
 * QR locator
 *
 * Scans raster regions in document order and returns the first decoded
 * payload that is a valid lookup URL. Whole-page renders are never scanned.
 * Not finding a code is a normal result, not an exception.
 */

import type {
  ImageProcessor,
  ProviderCallOptions,
  QrDecoder,
  RasterRegion,
} from '@efaktur/contracts';
import { createSilentLogger, isEFakturError, throwIfCancelled, toLookupUrl, type Logger } from '@efaktur/shared';
import { DEFAULT_QR_VARIANTS, type QrVariant } from './variants.js';

export type QrSearchResult =
  | {
      readonly found: true;
      readonly url: string;
      /** Index into the regions passed to `locate` */
      readonly regionIndex: number;
      readonly variant: string;
    }
  | {
      readonly found: false;
      /** Decode attempts made (region x variant) */
      readonly attempts: number;
    };

export interface QrLocatorConfig {
  decoder: QrDecoder;
  imageProcessor: ImageProcessor;
  /** @default DEFAULT_QR_VARIANTS */
  variants?: readonly QrVariant[];
  /** Hosts a lookup URL may point at; empty allows any */
  allowedHosts?: readonly string[];
  logger?: Logger;
}

export interface QrLocator {
  locate(regions: readonly RasterRegion[], options?: ProviderCallOptions): Promise<QrSearchResult>;
}

/**
 * Whether a region is eligible for QR scanning
 */
export function isScannableRegion(region: RasterRegion): boolean {
  return region.provenance.kind !== 'page-render';
}

export function createQrLocator(config: QrLocatorConfig): QrLocator {
  const variants = config.variants ?? DEFAULT_QR_VARIANTS;
  const allowedHosts = config.allowedHosts ?? [];
  const logger = config.logger ?? createSilentLogger();

  return {
    async locate(regions, options = {}) {
      let attempts = 0;
      let rejectedPayloads = 0;

      for (const [regionIndex, region] of regions.entries()) {
        if (!isScannableRegion(region)) {
          continue;
        }

        for (const variant of variants) {
          throwIfCancelled(options.signal, 'qr');
          attempts += 1;

          let payloads: string[];
          try {
            const prepared = await variant.prepare(region.image, config.imageProcessor);
            payloads = await config.decoder.decode(prepared, options);
          } catch (error) {
            if (isEFakturError(error) && error.code === 'CANCELLED') {
              throw error;
            }
            logger.warn('QR variant failed', {
              regionIndex,
              variant: variant.name,
              error: error instanceof Error ? error.message : String(error),
            });
            continue;
          }

          for (const payload of payloads) {
            const url = toLookupUrl(payload, allowedHosts);
            if (url !== undefined) {
              logger.info('QR lookup URL found', {
                regionIndex,
                variant: variant.name,
                host: new URL(url).host,
                attempts,
              });
              return { found: true, url, regionIndex, variant: variant.name };
            }
            rejectedPayloads += 1;
          }
        }
      }

      logger.info('No QR lookup URL found', { attempts, rejectedPayloads });
      return { found: false, attempts };
    },
  };
}
