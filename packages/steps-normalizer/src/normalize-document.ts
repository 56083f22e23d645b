import type {
  DocumentInput,
  DocumentReader,
  ImageProcessor,
  NormalizedDocument,
  ProviderCallOptions,
  RasterImage,
  RasterRegion,
  StructuredDocument,
  TextRecognizer,
  TextSource,
} from '@efaktur/contracts';
import {
  CancelledError,
  CorruptInputError,
  createSilentLogger,
  throwIfCancelled,
  type Logger,
} from '@efaktur/shared';
import { detectModality, resolveMediaType } from './detect-modality.js';

/**
 * Document normalizer configuration
 */
export interface DocumentNormalizerConfig {
  documentReader: DocumentReader;
  textRecognizer: TextRecognizer;
  imageProcessor: ImageProcessor;
  logger?: Logger;
}

export interface NormalizeOptions {
  signal?: AbortSignal;
}

export interface DocumentNormalizer {
  normalize(input: DocumentInput, options?: NormalizeOptions): Promise<NormalizedDocument>;
}

const PAGE_SEPARATOR = '\n\n';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function summarizeTextSource(textLayerPages: number, ocrPages: number): TextSource {
  if (textLayerPages > 0 && ocrPages > 0) return 'mixed';
  if (textLayerPages > 0) return 'text-layer';
  if (ocrPages > 0) return 'ocr';
  return 'none';
}

/**
 * Create the normalizer that turns an upload into plain text plus raster
 * regions.
 *
 * PDF pages contribute their text layer; a page without one is rendered and
 * passed through OCR instead. Images are decoded, prepared and recognized as
 * a single region. Embedded images are listed in document order for the QR
 * stage.
 */
export function createDocumentNormalizer(config: DocumentNormalizerConfig): DocumentNormalizer {
  const { documentReader, textRecognizer, imageProcessor } = config;
  const logger = config.logger ?? createSilentLogger();

  const recognize = async (
    image: RasterImage,
    callOptions: ProviderCallOptions,
    context: Record<string, unknown>,
  ): Promise<string> => {
    try {
      const prepared = await imageProcessor.prepareForOcr(image);
      throwIfCancelled(callOptions.signal, 'ocr');
      return (await textRecognizer.recognize(prepared, callOptions)).trim();
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      throwIfCancelled(callOptions.signal, 'ocr');
      logger.error('Text recognition failed', {
        ...context,
        recognizer: textRecognizer.name,
        error: errorMessage(error),
      });
      return '';
    }
  };

  const normalizeStructured = async (
    content: Uint8Array,
    callOptions: ProviderCallOptions,
  ): Promise<NormalizedDocument> => {
    let document: StructuredDocument;
    try {
      document = await documentReader.open(content, callOptions);
    } catch (error) {
      throwIfCancelled(callOptions.signal, 'normalize');
      throw new CorruptInputError(
        `Could not open PDF: ${errorMessage(error)}`,
        { reader: documentReader.name },
        { cause: error },
      );
    }

    try {
      const texts: string[] = [];
      const regions: RasterRegion[] = [];
      let textLayerPages = 0;
      let ocrPages = 0;

      for (const page of document.pages) {
        throwIfCancelled(callOptions.signal, 'normalize');

        page.images.forEach((embedded, imageIndex) => {
          regions.push({
            image: embedded.image,
            provenance:
              embedded.position === undefined
                ? { kind: 'embedded', pageIndex: page.index, imageIndex }
                : { kind: 'embedded', pageIndex: page.index, imageIndex, position: embedded.position },
          });
        });

        const text = page.text.trim();
        if (text.length > 0) {
          texts.push(text);
          textLayerPages++;
          continue;
        }

        const rendered = await page.render(callOptions);
        if (rendered === undefined) {
          logger.debug('Page has no text layer and no render', { pageIndex: page.index });
          continue;
        }
        regions.push({ image: rendered, provenance: { kind: 'page-render', pageIndex: page.index } });

        const recognized = await recognize(rendered, callOptions, { pageIndex: page.index });
        if (recognized.length > 0) {
          texts.push(recognized);
          ocrPages++;
        }
      }

      const textSource = summarizeTextSource(textLayerPages, ocrPages);
      logger.debug('PDF normalized', {
        pageCount: document.pages.length,
        regionCount: regions.length,
        textSource,
      });

      return {
        modality: 'structured',
        mediaType: 'application/pdf',
        plainText: texts.join(PAGE_SEPARATOR),
        rasterRegions: regions,
        textSource,
        pageCount: document.pages.length,
      };
    } finally {
      await document.close();
    }
  };

  const normalizeRaster = async (
    content: Uint8Array,
    callOptions: ProviderCallOptions,
  ): Promise<NormalizedDocument> => {
    let image: RasterImage;
    try {
      const info = await imageProcessor.inspect(content);
      image = { data: content, mediaType: info.mediaType, width: info.width, height: info.height };
    } catch (error) {
      throwIfCancelled(callOptions.signal, 'normalize');
      throw new CorruptInputError(
        `Could not decode image: ${errorMessage(error)}`,
        { processor: imageProcessor.name },
        { cause: error },
      );
    }

    const text = await recognize(image, callOptions, { width: image.width, height: image.height });
    const textSource: TextSource = text.length > 0 ? 'ocr' : 'none';
    logger.debug('Image normalized', { width: image.width, height: image.height, textSource });

    return {
      modality: 'raster',
      mediaType: image.mediaType,
      plainText: text,
      rasterRegions: [{ image, provenance: { kind: 'standalone' } }],
      textSource,
      pageCount: 1,
    };
  };

  return {
    async normalize(input, options = {}) {
      const callOptions: ProviderCallOptions = {};
      if (options.signal !== undefined) {
        callOptions.signal = options.signal;
      }

      if (input.content.length === 0) {
        throw new CorruptInputError('Uploaded file is empty');
      }
      throwIfCancelled(options.signal, 'normalize');

      const mediaType = resolveMediaType(input);
      return detectModality(mediaType) === 'structured'
        ? normalizeStructured(input.content, callOptions)
        : normalizeRaster(input.content, callOptions);
    },
  };
}
