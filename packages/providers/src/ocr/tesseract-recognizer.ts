import Tesseract from 'tesseract.js';
import type { TextRecognizer } from '@efaktur/contracts';
import { createSilentLogger, throwIfCancelled, type Logger } from '@efaktur/shared';
import { assertBundledLanguages, loadBundledLanguages } from './language-data.js';

export interface TesseractRecognizerOptions {
  /**
   * Language codes joined by `+`
   * @default 'eng+ind'
   */
  languages?: string;
  /**
   * Directory holding `<lang>.traineddata.gz` files. Without it only the
   * languages installed from npm (`eng`, `ind`) are available.
   */
  langPath?: string;
  logger?: Logger;
}

/**
 * A recognizer that owns an OCR worker
 */
export interface ManagedTextRecognizer extends TextRecognizer {
  terminate(): Promise<void>;
}

/**
 * Create a tesseract.js recognizer.
 *
 * The worker starts on first use and is shared by all calls until
 * `terminate()`. A recognition in progress cannot be interrupted; the signal
 * is checked before and after it. Trained data is read from disk and never
 * cached or downloaded.
 *
 * @throws ConfigurationError when a language has no installed data and no `langPath` is set
 */
export function createTesseractRecognizer(options: TesseractRecognizerOptions = {}): ManagedTextRecognizer {
  const languages = (options.languages ?? 'eng+ind').split('+');
  const logger = options.logger ?? createSilentLogger();
  const langPath = options.langPath;
  if (langPath === undefined) {
    assertBundledLanguages(languages);
  }
  let worker: Promise<Tesseract.Worker> | undefined;

  const startWorker = async (): Promise<Tesseract.Worker> => {
    const workerOptions: Partial<Tesseract.WorkerOptions> = { cacheMethod: 'none' };
    if (langPath !== undefined) {
      workerOptions.langPath = langPath;
      return Tesseract.createWorker(languages, undefined, workerOptions);
    }
    return Tesseract.createWorker(await loadBundledLanguages(languages), undefined, workerOptions);
  };

  const getWorker = (): Promise<Tesseract.Worker> => {
    if (worker === undefined) {
      logger.info('Starting OCR worker', { languages, source: langPath ?? 'installed packages' });
      worker = startWorker().catch((error: unknown) => {
        worker = undefined;
        throw error;
      });
    }
    return worker;
  };

  return {
    name: 'tesseract',

    async recognize(image, callOptions = {}) {
      throwIfCancelled(callOptions.signal, 'ocr');
      const ocr = await getWorker();
      const result = await ocr.recognize(Buffer.from(image.data));
      throwIfCancelled(callOptions.signal, 'ocr');
      logger.debug('OCR finished', { confidence: result.data.confidence });
      return result.data.text;
    },

    async terminate() {
      const running = worker;
      worker = undefined;
      if (running !== undefined) {
        await (await running).terminate();
      }
    },
  };
}
