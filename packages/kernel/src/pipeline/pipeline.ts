import type {
  CompletedValidation,
  DocumentInput,
  FailedValidation,
  OutcomeErrorCode,
  ProviderCallOptions,
  RecordFetcher,
  ValidationOutcome,
} from '@efaktur/contracts';
import {
  CancelledError,
  createSilentLogger,
  defaultIdGenerator,
  generateCorrelationId,
  generateRunId,
  isEFakturError,
  QrNotFoundError,
  throwIfCancelled,
  type EFakturErrorCode,
  type IdGenerator,
  type Logger,
} from '@efaktur/shared';
import type { DocumentNormalizer } from '@efaktur/steps-normalizer';
import type { QrLocator } from '@efaktur/steps-qr';
import { parseAuthorityRecord } from '@efaktur/steps-authority';
import { DEFAULT_EXTRACTION_RULES, extractFields, type AnyExtractionRule } from '@efaktur/steps-extractor';
import type { DeviationEngine } from '@efaktur/steps-deviation';
import {
  NoopEventHooks,
  type KernelEventHooks,
  type PipelineStage,
  type PipelineStartEvent,
} from '../events/hooks.js';

/**
 * Collaborators and options of a pipeline.
 */
export interface PipelineConfig {
  normalizer: DocumentNormalizer;
  qrLocator: QrLocator;
  recordFetcher: RecordFetcher;
  deviationEngine: DeviationEngine;
  /** @default DEFAULT_EXTRACTION_RULES */
  extractionRules?: readonly AnyExtractionRule[];
  events?: KernelEventHooks;
  logger?: Logger;
  /** Source of run and correlation ids */
  idGenerator?: IdGenerator;
  /**
   * Attach the normalized document text to successful outcomes.
   * The text contains personal data.
   * @default false
   */
  includeRawText?: boolean;
}

/**
 * One validation request
 */
export interface ValidateRequest {
  file: Uint8Array;
  mediaType?: string;
  fileName?: string;
  signal?: AbortSignal;
  correlationId?: string;
}

/** Message for failures outside the error taxonomy */
export const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred during validation';

const NO_DEVIATIONS: readonly [] = [];
Object.freeze(NO_DEVIATIONS);

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

interface RunState {
  readonly runId: string;
  readonly correlationId: string;
  readonly logger: Logger;
  readonly callOptions: ProviderCallOptions;
  stage: PipelineStage;
}

function toOutcomeCode(code: EFakturErrorCode): OutcomeErrorCode {
  return code === 'CANCELLED' || code === 'CONFIGURATION_ERROR' ? 'INTERNAL_ERROR' : code;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Pipeline runs one document through
 * normalize → locate QR → fetch → parse → extract → compare.
 *
 * `validate` resolves to an outcome for every failure in the error taxonomy
 * and for unexpected exceptions; it rejects only with CancelledError.
 */
export class Pipeline {
  private readonly config: PipelineConfig;
  private readonly events: KernelEventHooks;
  private readonly logger: Logger;
  private readonly idGenerator: IdGenerator;

  constructor(config: PipelineConfig) {
    this.config = config;
    this.events = config.events ?? new NoopEventHooks();
    this.logger = config.logger ?? createSilentLogger();
    this.idGenerator = config.idGenerator ?? defaultIdGenerator;
  }

  async validate(request: ValidateRequest): Promise<ValidationOutcome> {
    const startTime = Date.now();
    const runId = generateRunId(this.idGenerator);
    const correlationId = request.correlationId ?? generateCorrelationId(this.idGenerator);
    const callOptions: ProviderCallOptions = {};
    if (request.signal !== undefined) {
      callOptions.signal = request.signal;
    }
    const run: RunState = {
      runId,
      correlationId,
      logger: this.logger.child({ runId, correlationId }),
      callOptions,
      stage: 'normalize',
    };

    const startEvent: PipelineStartEvent = {
      runId,
      correlationId,
      timestamp: new Date().toISOString(),
      sizeBytes: request.file.length,
    };
    if (request.mediaType !== undefined) {
      startEvent.declaredMediaType = request.mediaType;
    }
    await this.notify(run, () => this.events.onPipelineStart?.(startEvent));

    let outcome: ValidationOutcome;
    try {
      outcome = await this.execute(request, run);
    } catch (error) {
      const cancelled =
        error instanceof CancelledError
          ? error
          : request.signal?.aborted
            ? new CancelledError(run.stage, { cause: error })
            : undefined;
      if (cancelled !== undefined) {
        await this.notifyError(run, 'CANCELLED', cancelled.message);
        throw cancelled;
      }
      outcome = this.toFailedValidation(error, run);
      await this.notifyError(run, outcome.error.code, outcome.message);
    }

    await this.notify(run, () =>
      this.events.onPipelineComplete?.({
        runId,
        correlationId,
        timestamp: new Date().toISOString(),
        durationMs: Date.now() - startTime,
        status: outcome.status,
        deviationCount: outcome.deviations.length,
      }),
    );
    return outcome;
  }

  private async execute(request: ValidateRequest, run: RunState): Promise<CompletedValidation> {
    const { callOptions, logger } = run;

    const input: Mutable<DocumentInput> = { content: request.file };
    if (request.mediaType !== undefined) {
      input.mediaType = request.mediaType;
    }
    if (request.fileName !== undefined) {
      input.fileName = request.fileName;
    }

    const document = await this.stage(run, 'normalize', () =>
      this.config.normalizer.normalize(input, callOptions),
    );

    const qr = await this.stage(run, 'qr', () =>
      this.config.qrLocator.locate(document.rasterRegions, callOptions),
    );
    if (!qr.found) {
      throw new QrNotFoundError(qr.attempts, { regionCount: document.rasterRegions.length });
    }

    const payload = await this.stage(run, 'fetch', () =>
      this.config.recordFetcher.fetch(qr.url, callOptions),
    );
    const record = await this.stage(run, 'parse', () => parseAuthorityRecord(payload, { logger }));

    const extraction = await this.stage(run, 'extract', () =>
      extractFields(document.plainText, {
        rules: this.config.extractionRules ?? DEFAULT_EXTRACTION_RULES,
        logger,
      }),
    );

    const reconciliation = await this.stage(run, 'compare', () =>
      this.config.deviationEngine.compare(extraction.fields, record.fields, record.unparsedFields),
    );

    const outcome: Mutable<CompletedValidation> = {
      ...reconciliation,
      runId: run.runId,
      correlationId: run.correlationId,
      extractedData: Object.freeze({ ...extraction.fields }),
      qrUrl: qr.url,
      authority: Object.freeze({ ...record.metadata }),
    };
    if (this.config.includeRawText === true) {
      outcome.rawText = document.plainText;
    }
    return Object.freeze(outcome);
  }

  private async stage<T>(run: RunState, stage: PipelineStage, fn: () => T | Promise<T>): Promise<T> {
    throwIfCancelled(run.callOptions.signal, stage);
    run.stage = stage;
    await this.notify(run, () =>
      this.events.onStepStart?.({
        runId: run.runId,
        correlationId: run.correlationId,
        timestamp: new Date().toISOString(),
        stage,
      }),
    );

    const startTime = Date.now();
    const result = await fn();

    await this.notify(run, () =>
      this.events.onStepComplete?.({
        runId: run.runId,
        correlationId: run.correlationId,
        timestamp: new Date().toISOString(),
        stage,
        durationMs: Date.now() - startTime,
      }),
    );
    return result;
  }

  private toFailedValidation(error: unknown, run: RunState): FailedValidation {
    const code = isEFakturError(error) ? toOutcomeCode(error.code) : 'INTERNAL_ERROR';

    if (code === 'INTERNAL_ERROR') {
      run.logger.error('Unexpected validation failure', {
        stage: run.stage,
        error: errorMessage(error),
      });
    }

    const outcomeError: { code: OutcomeErrorCode; context?: Record<string, unknown> } = { code };
    if (code !== 'INTERNAL_ERROR' && isEFakturError(error) && error.context !== undefined) {
      outcomeError.context = error.context;
    }

    const outcome: FailedValidation = {
      status: 'error',
      runId: run.runId,
      correlationId: run.correlationId,
      message: code === 'INTERNAL_ERROR' ? INTERNAL_ERROR_MESSAGE : errorMessage(error),
      error: Object.freeze(outcomeError),
      deviations: NO_DEVIATIONS,
      validatedData: Object.freeze({}),
    };
    return Object.freeze(outcome);
  }

  private async notifyError(run: RunState, code: EFakturErrorCode, message: string): Promise<void> {
    await this.notify(run, () =>
      this.events.onError?.({
        runId: run.runId,
        correlationId: run.correlationId,
        timestamp: new Date().toISOString(),
        stage: run.stage,
        code,
        message,
      }),
    );
  }

  /** Hook failures are logged and never change the outcome */
  private async notify(run: RunState, emit: () => void | Promise<void>): Promise<void> {
    try {
      await emit();
    } catch (error) {
      run.logger.warn('Event hook failed', { stage: run.stage, error: errorMessage(error) });
    }
  }
}
