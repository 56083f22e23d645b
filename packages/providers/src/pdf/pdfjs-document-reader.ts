/**
 * PDF reader on top of the pdf.js legacy build (the build that runs in Node).
 */

import { getDocument, OPS } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type {
  DocumentPage,
  DocumentReader,
  EmbeddedImage,
  ProviderCallOptions,
  RasterImage,
  StructuredDocument,
} from '@efaktur/contracts';
import { createSilentLogger, throwIfCancelled, type Logger } from '@efaktur/shared';
import { encodeRawPixels } from '../image/sharp-image-processor.js';
import { isPdfImageObject, toRawPixels } from './pdf-image.js';

type PdfDocument = Awaited<ReturnType<typeof getDocument>['promise']>;
type PdfPage = Awaited<ReturnType<PdfDocument['getPage']>>;

export interface PdfjsDocumentReaderOptions {
  /**
   * How long to wait for pdf.js to decode one image.
   * @default 5000
   */
  imageTimeoutMs?: number;
  logger?: Logger;
}

async function readPageText(page: PdfPage): Promise<string> {
  const content = await page.getTextContent();
  let text = '';
  for (const item of content.items) {
    if ('str' in item) {
      text += item.str;
      if (item.hasEOL) {
        text += '\n';
      }
    }
  }
  return text;
}

/**
 * Resolve a decoded image object; page-local ids first, then shared ones
 */
function resolveImageObject(page: PdfPage, objectId: string, timeoutMs: number): Promise<unknown> {
  const store = objectId.startsWith('g_') ? page.commonObjs : page.objs;
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(undefined), timeoutMs);
    store.get(objectId, (value: unknown) => {
      clearTimeout(timer);
      resolve(value);
    });
  });
}

/**
 * Read the page's embedded images in drawing order
 */
async function readPageImages(
  page: PdfPage,
  timeoutMs: number,
  logger: Logger,
  options: ProviderCallOptions,
): Promise<EmbeddedImage[]> {
  const operators = await page.getOperatorList();
  const images: EmbeddedImage[] = [];

  for (let i = 0; i < operators.fnArray.length; i++) {
    if (operators.fnArray[i] !== OPS.paintImageXObject) continue;
    throwIfCancelled(options.signal, 'normalize');

    const args: unknown = operators.argsArray[i];
    const objectId: unknown = Array.isArray(args) ? args[0] : undefined;
    if (typeof objectId !== 'string') continue;

    const object = await resolveImageObject(page, objectId, timeoutMs);
    const pixels = isPdfImageObject(object) ? toRawPixels(object) : undefined;
    if (pixels === undefined) {
      logger.debug('Skipping undecodable PDF image', { pageIndex: page.pageNumber - 1, objectId });
      continue;
    }
    images.push({ image: await encodeRawPixels(pixels) });
  }
  return images;
}

function largestImage(images: readonly EmbeddedImage[]): RasterImage | undefined {
  let largest: RasterImage | undefined;
  for (const { image } of images) {
    if (largest === undefined || image.width * image.height > largest.width * largest.height) {
      largest = image;
    }
  }
  return largest;
}

/**
 * Create a DocumentReader backed by pdf.js.
 *
 * Pages are read eagerly: text layer and embedded images. pdf.js has no
 * canvas in Node, so `render()` resolves to the page's largest embedded image
 * (a scanned page is one full-page image), or undefined when it has none.
 */
export function createPdfjsDocumentReader(options: PdfjsDocumentReaderOptions = {}): DocumentReader {
  const imageTimeoutMs = options.imageTimeoutMs ?? 5000;
  const logger = options.logger ?? createSilentLogger();

  return {
    name: 'pdfjs',

    async open(content, callOptions = {}): Promise<StructuredDocument> {
      // pdf.js takes ownership of the buffer it is given
      const loadingTask = getDocument({
        data: content.slice(),
        isEvalSupported: false,
        isOffscreenCanvasSupported: false,
        disableFontFace: true,
        useSystemFonts: false,
        verbosity: 0,
      });
      const document = await loadingTask.promise;

      try {
        const pages: DocumentPage[] = [];
        for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
          throwIfCancelled(callOptions.signal, 'normalize');
          const page = await document.getPage(pageNumber);
          const text = await readPageText(page);
          const images = await readPageImages(page, imageTimeoutMs, logger, callOptions);
          page.cleanup();

          pages.push({
            index: pageNumber - 1,
            text,
            images,
            render: () => Promise.resolve(largestImage(images)),
          });
        }

        return {
          pages,
          close: () => document.destroy(),
        };
      } catch (error) {
        await document.destroy();
        throw error;
      }
    },
  };
}
