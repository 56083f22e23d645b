import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@efaktur/shared';
import {
  DEFAULT_NAME_POLICY,
  createFieldComparators,
  normalizeNameForComparison,
} from './comparators.js';

describe('normalizeNameForComparison', () => {
  it('should fold case and collapse whitespace by default', () => {
    expect(normalizeNameForComparison('  pt   Abc ', DEFAULT_NAME_POLICY)).toBe('PT ABC');
  });

  it('should keep punctuation and diacritics by default', () => {
    expect(normalizeNameForComparison('PT. Café', DEFAULT_NAME_POLICY)).toBe('PT. CAFÉ');
  });

  it('should apply the optional foldings', () => {
    const policy = { ...DEFAULT_NAME_POLICY, stripDiacritics: true, ignorePunctuation: true };
    expect(normalizeNameForComparison('PT. Café, Tbk', policy)).toBe('PT CAFE TBK');
  });
});

describe('createFieldComparators', () => {
  const comparators = createFieldComparators();

  it('should compare tax IDs and serial numbers exactly', () => {
    expect(comparators.npwpPenjual('012345678012000', '012345678012000')).toBe(true);
    expect(comparators.npwpPenjual('012345678012000', '012345678012001')).toBe(false);
    expect(comparators.nomorFaktur('0700002212345678', '0700002212345679')).toBe(false);
  });

  it('should compare names case-insensitively', () => {
    expect(comparators.namaPembeli('pt xyz', 'PT XYZ')).toBe(true);
    expect(comparators.namaPembeli('PT XYZ', 'PT XYZ INDONESIA')).toBe(false);
  });

  it('should honour a case-sensitive policy', () => {
    const strict = createFieldComparators({ namePolicy: { caseSensitive: true } });
    expect(strict.namaPenjual('pt abc', 'PT ABC')).toBe(false);
    expect(strict.namaPenjual('PT  ABC', 'PT ABC')).toBe(true);
  });

  it('should compare dates by calendar day', () => {
    expect(comparators.tanggalFaktur({ year: 2024, month: 2, day: 1 }, { year: 2024, month: 2, day: 1 })).toBe(
      true,
    );
    expect(comparators.tanggalFaktur({ year: 2024, month: 2, day: 1 }, { year: 2024, month: 1, day: 2 })).toBe(
      false,
    );
  });

  it('should compare amounts within the tolerance', () => {
    expect(comparators.jumlahDpp('15000000', '15000000.00')).toBe(true);
    expect(comparators.jumlahDpp('15000000', '15000000.009')).toBe(true);
    expect(comparators.jumlahDpp('15000000', '15000000.01')).toBe(false);
    expect(createFieldComparators({ amountTolerance: '1' }).jumlahPpn('100', '100.5')).toBe(true);
  });

  it('should reject an invalid tolerance', () => {
    expect(() => createFieldComparators({ amountTolerance: '-0.01' })).toThrow(ConfigurationError);
    expect(() => createFieldComparators({ amountTolerance: '1,5' })).toThrow(ConfigurationError);
  });
});
