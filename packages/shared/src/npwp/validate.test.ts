import { describe, it, expect } from 'vitest';
import {
  normalizeTaxId,
  validateTaxIdFormat,
  isValidTaxIdFormat,
  normalizeInvoiceNumber,
} from './validate.js';

describe('normalizeTaxId', () => {
  it('should strip separators', () => {
    expect(normalizeTaxId('01.234.567.8-012.000')).toBe('012345678012000');
    expect(normalizeTaxId('01 234 567 8 012 000')).toBe('012345678012000');
  });

  it('should keep leading zeros', () => {
    expect(normalizeTaxId('000000000000001')).toBe('000000000000001');
  });
});

describe('validateTaxIdFormat', () => {
  it('should accept a printed NPWP', () => {
    const result = validateTaxIdFormat('02.345.678.9-217.000');
    expect(result.valid).toBe(true);
    expect(result.normalized).toBe('023456789217000');
    expect(result.errorCode).toBeUndefined();
  });

  it('should reject empty input', () => {
    expect(validateTaxIdFormat('  ').errorCode).toBe('EMPTY_INPUT');
  });

  it('should reject letters', () => {
    const result = validateTaxIdFormat('01.234.567.8-O12.000');
    expect(result.valid).toBe(false);
    expect(result.errorCode).toBe('INVALID_CHARACTERS');
  });

  it('should reject wrong digit counts', () => {
    const result = validateTaxIdFormat('1234567890123');
    expect(result.valid).toBe(false);
    expect(result.errorCode).toBe('INVALID_LENGTH');
    expect(result.reason).toBe('Tax ID must have 15 digits, got 13');
  });

  it('isValidTaxIdFormat mirrors the result', () => {
    expect(isValidTaxIdFormat('012345678012000')).toBe(true);
    expect(isValidTaxIdFormat('0123456780120001')).toBe(false);
  });
});

describe('invoice numbers', () => {
  it('should normalize a printed serial number', () => {
    expect(normalizeInvoiceNumber('070.000-22.12345678')).toBe('0700002212345678');
  });

  it('should reject serial numbers that are not 16 digits', () => {
    expect(normalizeInvoiceNumber('070.000-22.1234567')).toBeUndefined();
  });
});
