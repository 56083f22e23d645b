import type {
  DocumentReader,
  ImageProcessor,
  QrDecoder,
  RecordFetcher,
  TextRecognizer,
} from '@efaktur/contracts';
import type { IdGenerator, Logger } from '@efaktur/shared';
import { createDocumentNormalizer, type DocumentNormalizerConfig } from '@efaktur/steps-normalizer';
import { createQrLocator, type QrLocatorConfig } from '@efaktur/steps-qr';
import { createDeviationEngine } from '@efaktur/steps-deviation';
import { DEFAULT_VALIDATOR_CONFIG, type ValidatorConfig } from '../config/effective-config.js';
import type { KernelEventHooks } from '../events/hooks.js';
import { Pipeline, type PipelineConfig } from './pipeline.js';

/**
 * Concrete capability providers a pipeline runs on
 */
export interface CapabilityProviders {
  documentReader: DocumentReader;
  textRecognizer: TextRecognizer;
  imageProcessor: ImageProcessor;
  qrDecoder: QrDecoder;
  recordFetcher: RecordFetcher;
}

export interface AssembleOptions {
  logger?: Logger;
  events?: KernelEventHooks;
  idGenerator?: IdGenerator;
}

/**
 * Wire the pipeline stages onto a set of providers using the comparison,
 * QR and output settings of `config`.
 */
export function createValidatorPipeline(
  providers: CapabilityProviders,
  config: ValidatorConfig = DEFAULT_VALIDATOR_CONFIG,
  options: AssembleOptions = {},
): Pipeline {
  const normalizerConfig: DocumentNormalizerConfig = {
    documentReader: providers.documentReader,
    textRecognizer: providers.textRecognizer,
    imageProcessor: providers.imageProcessor,
  };
  const qrConfig: QrLocatorConfig = {
    decoder: providers.qrDecoder,
    imageProcessor: providers.imageProcessor,
    allowedHosts: config.authority.allowedHosts,
  };
  const pipelineConfig: Omit<PipelineConfig, 'normalizer' | 'qrLocator'> = {
    recordFetcher: providers.recordFetcher,
    deviationEngine: createDeviationEngine({
      amountTolerance: config.comparison.amountTolerance,
      namePolicy: config.comparison.namePolicy,
    }),
    includeRawText: config.includeRawText,
  };

  if (options.logger !== undefined) {
    normalizerConfig.logger = options.logger.child({ stage: 'normalize' });
    qrConfig.logger = options.logger.child({ stage: 'qr' });
    pipelineConfig.logger = options.logger;
  }
  if (options.events !== undefined) {
    pipelineConfig.events = options.events;
  }
  if (options.idGenerator !== undefined) {
    pipelineConfig.idGenerator = options.idGenerator;
  }

  return new Pipeline({
    ...pipelineConfig,
    normalizer: createDocumentNormalizer(normalizerConfig),
    qrLocator: createQrLocator(qrConfig),
  });
}
