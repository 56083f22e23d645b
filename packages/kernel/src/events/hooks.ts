/**
 * Kernel Event Hooks
 *
 * Lifecycle events of a validation run. Hooks observe; they never change the
 * outcome.
 *
 * @packageDocumentation
 */

import type { ValidationStatus } from '@efaktur/contracts';
import type { EFakturErrorCode, Logger } from '@efaktur/shared';

/**
 * Pipeline stages in execution order
 */
export const PIPELINE_STAGES = ['normalize', 'qr', 'fetch', 'parse', 'extract', 'compare'] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

/**
 * Event emitted when a validation run starts.
 */
export interface PipelineStartEvent {
  runId: string;
  correlationId: string;
  timestamp: string;
  sizeBytes: number;
  declaredMediaType?: string;
}

/**
 * Event emitted when a validation run produces an outcome.
 */
export interface PipelineCompleteEvent {
  runId: string;
  correlationId: string;
  timestamp: string;
  durationMs: number;
  status: ValidationStatus;
  deviationCount: number;
}

/**
 * Event emitted when a stage starts.
 */
export interface StepStartEvent {
  runId: string;
  correlationId: string;
  timestamp: string;
  stage: PipelineStage;
}

/**
 * Event emitted when a stage completes.
 */
export interface StepCompleteEvent {
  runId: string;
  correlationId: string;
  timestamp: string;
  stage: PipelineStage;
  durationMs: number;
}

/**
 * Event emitted when a stage ends the run with an error.
 */
export interface PipelineErrorEvent {
  runId: string;
  correlationId: string;
  timestamp: string;
  stage: PipelineStage;
  code: EFakturErrorCode;
  message: string;
}

/**
 * Abstract event hooks interface.
 *
 * Implement this interface to receive pipeline events.
 * All methods are optional and async-safe.
 *
 * @example
 * ```typescript
 * class TimingHooks implements KernelEventHooks {
 *   onStepComplete(event: StepCompleteEvent) {
 *     histogram.observe({ stage: event.stage }, event.durationMs);
 *   }
 * }
 * ```
 */
export interface KernelEventHooks {
  onPipelineStart?(event: PipelineStartEvent): void | Promise<void>;
  onPipelineComplete?(event: PipelineCompleteEvent): void | Promise<void>;
  onStepStart?(event: StepStartEvent): void | Promise<void>;
  onStepComplete?(event: StepCompleteEvent): void | Promise<void>;
  onError?(event: PipelineErrorEvent): void | Promise<void>;
}

/**
 * Composite event hooks that dispatches to multiple listeners.
 */
export class CompositeEventHooks implements KernelEventHooks {
  private readonly hooks: KernelEventHooks[];

  constructor(hooks: KernelEventHooks[]) {
    this.hooks = hooks;
  }

  async onPipelineStart(event: PipelineStartEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onPipelineStart?.(event)));
  }

  async onPipelineComplete(event: PipelineCompleteEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onPipelineComplete?.(event)));
  }

  async onStepStart(event: StepStartEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onStepStart?.(event)));
  }

  async onStepComplete(event: StepCompleteEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onStepComplete?.(event)));
  }

  async onError(event: PipelineErrorEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onError?.(event)));
  }
}

/**
 * No-op event hooks (default when no hooks configured).
 */
export class NoopEventHooks implements KernelEventHooks {}

/**
 * Event hooks that write stage timings to a logger.
 */
export class LoggingEventHooks implements KernelEventHooks {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  onPipelineStart(event: PipelineStartEvent): void {
    this.logger.info('Validation started', {
      runId: event.runId,
      correlationId: event.correlationId,
      sizeBytes: event.sizeBytes,
    });
  }

  onPipelineComplete(event: PipelineCompleteEvent): void {
    this.logger.info('Validation completed', {
      runId: event.runId,
      status: event.status,
      deviationCount: event.deviationCount,
      durationMs: event.durationMs,
    });
  }

  onStepStart(event: StepStartEvent): void {
    this.logger.debug('Stage started', { runId: event.runId, stage: event.stage });
  }

  onStepComplete(event: StepCompleteEvent): void {
    this.logger.debug('Stage completed', {
      runId: event.runId,
      stage: event.stage,
      durationMs: event.durationMs,
    });
  }

  onError(event: PipelineErrorEvent): void {
    this.logger.warn('Validation stopped', {
      runId: event.runId,
      stage: event.stage,
      code: event.code,
      message: event.message,
    });
  }
}
