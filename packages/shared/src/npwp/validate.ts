/**
 * Offline shape checks for NPWP tax IDs and e-Faktur serial numbers.
 */

import { INVOICE_NUMBER_LENGTH, TAX_ID_LENGTH } from './constants.js';

/**
 * Result of tax ID format validation
 */
export interface TaxIdValidationResult {
  /** Whether the tax ID has the expected shape */
  readonly valid: boolean;

  /** Digits only */
  readonly normalized: string;

  /** Error reason (if invalid) */
  readonly reason: string | undefined;

  /** Error code for programmatic handling */
  readonly errorCode: TaxIdErrorCode | undefined;
}

export type TaxIdErrorCode = 'EMPTY_INPUT' | 'INVALID_CHARACTERS' | 'INVALID_LENGTH';

/**
 * Strip everything but digits.
 *
 * @example
 * ```typescript
 * normalizeTaxId('01.234.567.8-012.000') // '012345678012000'
 * ```
 */
export function normalizeTaxId(taxId: string): string {
  return taxId.replace(/\D/g, '');
}

/**
 * Validate an NPWP. Dots, dashes and blanks are accepted as separators;
 * anything else is rejected.
 */
export function validateTaxIdFormat(taxId: string): TaxIdValidationResult {
  if (taxId.trim() === '') {
    return {
      valid: false,
      normalized: '',
      reason: 'Tax ID must be a non-empty string',
      errorCode: 'EMPTY_INPUT',
    };
  }

  if (!/^[\d.\-\s]+$/.test(taxId.trim())) {
    return {
      valid: false,
      normalized: normalizeTaxId(taxId),
      reason: 'Tax ID may only contain digits and separators',
      errorCode: 'INVALID_CHARACTERS',
    };
  }

  const normalized = normalizeTaxId(taxId);
  if (normalized.length !== TAX_ID_LENGTH) {
    return {
      valid: false,
      normalized,
      reason: `Tax ID must have ${TAX_ID_LENGTH} digits, got ${normalized.length}`,
      errorCode: 'INVALID_LENGTH',
    };
  }

  return { valid: true, normalized, reason: undefined, errorCode: undefined };
}

export function isValidTaxIdFormat(taxId: string): boolean {
  return validateTaxIdFormat(taxId).valid;
}

/**
 * Digits of an e-Faktur serial number, or undefined when it is not 16 digits
 */
export function normalizeInvoiceNumber(text: string): string | undefined {
  if (!/^[\d.\-\s]+$/.test(text.trim())) {
    return undefined;
  }
  const digits = text.replace(/\D/g, '');
  return digits.length === INVOICE_NUMBER_LENGTH ? digits : undefined;
}
