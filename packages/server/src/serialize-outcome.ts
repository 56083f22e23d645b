/**
 * JSON shape of the validation endpoint.
 */

import {
  FIELD_NAMES,
  type DeviationKind,
  type FieldValue,
  type InvoiceFieldSet,
  type OutcomeError,
  type ValidationOutcome,
} from '@efaktur/contracts';
import { formatDisplayDate, getField } from '@efaktur/shared';

export type WireDeviationType = 'mismatch' | 'missing_in_pdf' | 'missing_in_api';

export interface WireDeviation {
  field: string;
  pdf_value: string | null;
  djp_api_value: string | null;
  deviation_type: WireDeviationType;
}

export interface ValidationResponseBody {
  status: 'validated_successfully' | 'validated_with_deviations';
  message: string;
  validation_results: {
    deviations: WireDeviation[];
    validated_data: Record<string, string>;
    extracted_data: Record<string, string>;
    qr_url: string;
    authority_status: string | null;
    raw_ocr_text?: string;
  };
}

export interface ErrorResponseBody {
  status: 'error';
  message: string;
  error_code: string;
}

const WIRE_DEVIATION_TYPES: Readonly<Record<DeviationKind, WireDeviationType>> = {
  mismatch: 'mismatch',
  missing_in_document: 'missing_in_pdf',
  missing_in_api: 'missing_in_api',
};

/**
 * Dates print as DD/MM/YYYY; every other value is already a string
 */
export function serializeFieldValue(value: FieldValue): string {
  return typeof value === 'string' ? value : formatDisplayDate(value);
}

/**
 * Serialize a field set in schema order, leaving absent fields out
 */
export function serializeFieldSet(fields: InvoiceFieldSet): Record<string, string> {
  const result: Record<string, string> = {};
  for (const field of FIELD_NAMES) {
    const value = getField(fields, field);
    if (value !== undefined) {
      result[field] = serializeFieldValue(value);
    }
  }
  return result;
}

/**
 * HTTP status for a terminal pipeline error
 */
export function httpStatusForError(error: OutcomeError): number {
  switch (error.code) {
    case 'UNSUPPORTED_FORMAT':
    case 'CORRUPT_INPUT':
      return 400;
    case 'PAYLOAD_TOO_LARGE':
      return 413;
    case 'QR_NOT_FOUND':
      return 422;
    case 'NETWORK_ERROR':
      return error.context?.['reason'] === 'timeout' ? 504 : 502;
    case 'HTTP_ERROR':
    case 'MALFORMED_RESPONSE':
      return 502;
    case 'INTERNAL_ERROR':
      return 500;
  }
}

export function errorBody(message: string, errorCode: string): ErrorResponseBody {
  return { status: 'error', message, error_code: errorCode };
}

/**
 * Map an outcome to its HTTP status and JSON body
 */
export function serializeOutcome(
  outcome: ValidationOutcome,
): { statusCode: number; body: ValidationResponseBody | ErrorResponseBody } {
  if (outcome.status === 'error') {
    return {
      statusCode: httpStatusForError(outcome.error),
      body: errorBody(outcome.message, outcome.error.code),
    };
  }

  const results: ValidationResponseBody['validation_results'] = {
    deviations: outcome.deviations.map((deviation) => ({
      field: deviation.field,
      pdf_value: deviation.documentValue === undefined ? null : serializeFieldValue(deviation.documentValue),
      djp_api_value:
        deviation.authoritativeValue === undefined ? null : serializeFieldValue(deviation.authoritativeValue),
      deviation_type: WIRE_DEVIATION_TYPES[deviation.kind],
    })),
    validated_data: serializeFieldSet(outcome.validatedData),
    extracted_data: serializeFieldSet(outcome.extractedData),
    qr_url: outcome.qrUrl,
    authority_status: outcome.authority.approvalStatus ?? null,
  };
  if (outcome.rawText !== undefined) {
    results.raw_ocr_text = outcome.rawText;
  }

  return {
    statusCode: 200,
    body: { status: outcome.status, message: outcome.message, validation_results: results },
  };
}
