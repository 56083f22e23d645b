/**
 * @efaktur/kernel
 *
 * Pipeline orchestrator for e-Faktur validation.
 *
 * @packageDocumentation
 */

export { Pipeline, INTERNAL_ERROR_MESSAGE } from './pipeline/pipeline.js';
export type { PipelineConfig, ValidateRequest } from './pipeline/pipeline.js';

export { createValidatorPipeline } from './pipeline/assemble.js';
export type { AssembleOptions, CapabilityProviders } from './pipeline/assemble.js';

export { loadConfig, DEFAULT_VALIDATOR_CONFIG } from './config/effective-config.js';
export type { AuthorityMode, ValidatorConfig } from './config/effective-config.js';

// Event Hooks
export {
  CompositeEventHooks,
  NoopEventHooks,
  LoggingEventHooks,
  PIPELINE_STAGES,
} from './events/hooks.js';

export type {
  KernelEventHooks,
  PipelineStage,
  PipelineStartEvent,
  PipelineCompleteEvent,
  PipelineErrorEvent,
  StepStartEvent,
  StepCompleteEvent,
} from './events/hooks.js';
