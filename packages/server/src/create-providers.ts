import { readFile } from 'node:fs/promises';
import type { RecordFetcher } from '@efaktur/contracts';
import type { CapabilityProviders, ValidatorConfig } from '@efaktur/kernel';
import {
  createDefaultHttpClient,
  createJsQrDecoder,
  createPdfjsDocumentReader,
  createSharpImageProcessor,
  createTesseractRecognizer,
  type TesseractRecognizerOptions,
} from '@efaktur/providers';
import { ConfigurationError, type Logger } from '@efaktur/shared';
import { createAuthorityFetcher, createFixtureRecordFetcher } from '@efaktur/steps-authority';

export interface ProviderSet {
  providers: CapabilityProviders;
  /** Release OCR workers */
  close(): Promise<void>;
}

async function createRecordFetcher(config: ValidatorConfig, logger: Logger): Promise<RecordFetcher> {
  const fetcherLogger = logger.child({ component: 'authority' });
  const { authority } = config;

  if (authority.mode === 'fixture') {
    if (authority.fixturePath === undefined) {
      throw new ConfigurationError('AUTHORITY_FIXTURE_PATH is required in fixture mode');
    }
    const payload = await readFile(authority.fixturePath).catch((error: unknown) => {
      throw new ConfigurationError(`Cannot read authority fixture ${authority.fixturePath ?? ''}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    });
    logger.warn('Serving authority records from a fixture file', { path: authority.fixturePath });
    return createFixtureRecordFetcher(payload, { logger: fetcherLogger });
  }

  return createAuthorityFetcher({
    httpClient: createDefaultHttpClient(),
    timeoutMs: authority.timeoutMs,
    allowedHosts: authority.allowedHosts,
    logger: fetcherLogger,
  });
}

/**
 * Build the production providers for `config`.
 */
export async function createProviders(config: ValidatorConfig, logger: Logger): Promise<ProviderSet> {
  const recognizerOptions: TesseractRecognizerOptions = {
    languages: config.ocr.languages,
    logger: logger.child({ component: 'ocr' }),
  };
  if (config.ocr.langPath !== undefined) {
    recognizerOptions.langPath = config.ocr.langPath;
  }
  const textRecognizer = createTesseractRecognizer(recognizerOptions);

  return {
    providers: {
      documentReader: createPdfjsDocumentReader({ logger: logger.child({ component: 'pdf' }) }),
      textRecognizer,
      imageProcessor: createSharpImageProcessor(),
      qrDecoder: createJsQrDecoder(),
      recordFetcher: await createRecordFetcher(config, logger),
    },
    close: () => textRecognizer.terminate(),
  };
}
