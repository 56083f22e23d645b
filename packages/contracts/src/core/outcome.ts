import type { AuthorityMetadata } from './authority.js';
import type { FieldName, FieldValue, InvoiceFieldSet } from './fields.js';

/**
 * Kind of discrepancy between document and authority for one field
 */
export type DeviationKind = 'mismatch' | 'missing_in_document' | 'missing_in_api';

/**
 * A detected discrepancy for a single field. A field yields at most one.
 */
export interface Deviation {
  readonly field: FieldName;
  readonly kind: DeviationKind;
  /** Value extracted from the submitted document */
  readonly documentValue?: FieldValue;
  /** Value from the authoritative record */
  readonly authoritativeValue?: FieldValue;
}

export type ValidationStatus =
  | 'validated_successfully'
  | 'validated_with_deviations'
  | 'error';

/**
 * Result of comparing the two field sets.
 */
export interface ReconciliationOutcome {
  readonly status: Exclude<ValidationStatus, 'error'>;
  readonly message: string;
  readonly deviations: readonly Deviation[];
  /** Reconciled view, authoritative value wherever one exists */
  readonly validatedData: InvoiceFieldSet;
}

/**
 * Error codes surfaced to callers.
 */
export type OutcomeErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'CORRUPT_INPUT'
  | 'QR_NOT_FOUND'
  | 'NETWORK_ERROR'
  | 'HTTP_ERROR'
  | 'MALFORMED_RESPONSE'
  | 'PAYLOAD_TOO_LARGE'
  | 'INTERNAL_ERROR';

export interface OutcomeError {
  readonly code: OutcomeErrorCode;
  readonly context?: Record<string, unknown>;
}

/**
 * Outcome of a run that reached the comparison stage
 */
export interface CompletedValidation extends ReconciliationOutcome {
  readonly runId: string;
  readonly correlationId: string;
  readonly extractedData: InvoiceFieldSet;
  readonly qrUrl: string;
  readonly authority: AuthorityMetadata;
  /** Normalized document text; present only when requested */
  readonly rawText?: string;
}

/**
 * Outcome of a run stopped by a terminal error
 */
export interface FailedValidation {
  readonly status: 'error';
  readonly runId: string;
  readonly correlationId: string;
  readonly message: string;
  readonly error: OutcomeError;
  readonly deviations: readonly [];
  readonly validatedData: InvoiceFieldSet;
}

/**
 * Top-level result of one validation request. Never mutated once built.
 */
export type ValidationOutcome = CompletedValidation | FailedValidation;
