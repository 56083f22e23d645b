/**
 * Deviation engine
 *
 * Reduces the document and authority field sets to an ordered deviation list
 * and the validated view. Pure: never throws on data and never mutates its
 * inputs.
 */

import {
  FIELD_NAMES,
  type Deviation,
  type FieldName,
  type InvoiceFieldSet,
  type MutableInvoiceFieldSet,
  type ReconciliationOutcome,
  type UnparsedFieldSet,
} from '@efaktur/contracts';
import { getField, setField } from '@efaktur/shared';
import { createFieldComparators, type ComparatorOptions, type FieldComparators } from './comparators.js';

export const MATCH_MESSAGE = 'E-Faktur data matches DJP records';

export function deviationMessage(count: number): string {
  return count === 0 ? MATCH_MESSAGE : `Found ${count} deviation(s) in e-Faktur data`;
}

function reconcileField<F extends FieldName>(
  field: F,
  documentFields: InvoiceFieldSet,
  authoritativeFields: InvoiceFieldSet,
  unparsedAuthoritative: UnparsedFieldSet,
  comparators: FieldComparators,
  validated: MutableInvoiceFieldSet,
): Deviation | undefined {
  const documentValue = getField(documentFields, field);
  const authoritativeValue = getField(authoritativeFields, field);

  if (authoritativeValue === undefined) {
    // Authority text of an unexpected shape never equals a parsed value
    const authoritativeText = unparsedAuthoritative[field];
    if (authoritativeText !== undefined) {
      return documentValue === undefined
        ? { field, kind: 'missing_in_document', authoritativeValue: authoritativeText }
        : { field, kind: 'mismatch', documentValue, authoritativeValue: authoritativeText };
    }
    return documentValue === undefined ? undefined : { field, kind: 'missing_in_api', documentValue };
  }

  setField(validated, field, authoritativeValue);
  if (documentValue === undefined) {
    return { field, kind: 'missing_in_document', authoritativeValue };
  }

  const compare = comparators[field];
  if (compare(documentValue, authoritativeValue)) {
    return undefined;
  }
  return { field, kind: 'mismatch', documentValue, authoritativeValue };
}

/**
 * Compare with precomputed comparators
 */
export function reconcile(
  documentFields: InvoiceFieldSet,
  authoritativeFields: InvoiceFieldSet,
  comparators: FieldComparators,
  unparsedAuthoritative: UnparsedFieldSet = {},
): ReconciliationOutcome {
  const validated: MutableInvoiceFieldSet = {};
  const deviations: Deviation[] = [];

  for (const field of FIELD_NAMES) {
    const deviation = reconcileField(
      field,
      documentFields,
      authoritativeFields,
      unparsedAuthoritative,
      comparators,
      validated,
    );
    if (deviation !== undefined) {
      deviations.push(Object.freeze(deviation));
    }
  }

  const outcome: ReconciliationOutcome = {
    status: deviations.length === 0 ? 'validated_successfully' : 'validated_with_deviations',
    message: deviationMessage(deviations.length),
    deviations: Object.freeze(deviations),
    validatedData: Object.freeze(validated),
  };
  return Object.freeze(outcome);
}

/**
 * Compare the document field set against the authoritative one.
 *
 * Authority values listed in `unparsedAuthoritative` count as present: they
 * surface as `mismatch` (or `missing_in_document`) with the raw text, and stay
 * out of `validatedData`.
 *
 * @example
 * ```typescript
 * const outcome = compareFieldSets(
 *   { jumlahPpn: '1600000' },
 *   { jumlahPpn: '1650000' },
 * );
 * // outcome.deviations = [{ field: 'jumlahPpn', kind: 'mismatch', ... }]
 * // outcome.validatedData = { jumlahPpn: '1650000' }
 * ```
 */
export function compareFieldSets(
  documentFields: InvoiceFieldSet,
  authoritativeFields: InvoiceFieldSet,
  options: ComparatorOptions = {},
  unparsedAuthoritative: UnparsedFieldSet = {},
): ReconciliationOutcome {
  return reconcile(documentFields, authoritativeFields, createFieldComparators(options), unparsedAuthoritative);
}

export interface DeviationEngine {
  compare(
    documentFields: InvoiceFieldSet,
    authoritativeFields: InvoiceFieldSet,
    unparsedAuthoritative?: UnparsedFieldSet,
  ): ReconciliationOutcome;
}

/**
 * Create an engine with fixed comparison options
 */
export function createDeviationEngine(options: ComparatorOptions = {}): DeviationEngine {
  const comparators = createFieldComparators(options);
  return {
    compare: (documentFields, authoritativeFields, unparsedAuthoritative) =>
      reconcile(documentFields, authoritativeFields, comparators, unparsedAuthoritative),
  };
}
