import { describe, it, expect } from 'vitest';
import type { InvoiceFieldSet } from '@efaktur/contracts';
import { compareFieldSets, createDeviationEngine } from './compare-fields.js';

const AUTHORITATIVE: InvoiceFieldSet = {
  npwpPenjual: '012345678012000',
  namaPenjual: 'PT ABC',
  npwpPembeli: '023456789217000',
  namaPembeli: 'PT XYZ',
  nomorFaktur: '0700002212345678',
  tanggalFaktur: { year: 2022, month: 4, day: 1 },
  jumlahDpp: '15000000',
  jumlahPpn: '1650000',
};

describe('compareFieldSets', () => {
  it('should report success when every field matches', () => {
    const outcome = compareFieldSets({ ...AUTHORITATIVE }, AUTHORITATIVE);

    expect(outcome.status).toBe('validated_successfully');
    expect(outcome.message).toBe('E-Faktur data matches DJP records');
    expect(outcome.deviations).toEqual([]);
    expect(outcome.validatedData).toEqual(AUTHORITATIVE);
  });

  it('should report a single mismatch and adopt the authoritative value', () => {
    const outcome = compareFieldSets({ ...AUTHORITATIVE, jumlahPpn: '1600000' }, AUTHORITATIVE);

    expect(outcome.status).toBe('validated_with_deviations');
    expect(outcome.message).toBe('Found 1 deviation(s) in e-Faktur data');
    expect(outcome.deviations).toEqual([
      {
        field: 'jumlahPpn',
        kind: 'mismatch',
        documentValue: '1600000',
        authoritativeValue: '1650000',
      },
    ]);
    expect(outcome.validatedData.jumlahPpn).toBe('1650000');
  });

  it('should report a field missing from the document', () => {
    const { namaPembeli: _omitted, ...documentFields } = AUTHORITATIVE;
    const outcome = compareFieldSets(documentFields, AUTHORITATIVE);

    expect(outcome.deviations).toEqual([
      { field: 'namaPembeli', kind: 'missing_in_document', authoritativeValue: 'PT XYZ' },
    ]);
    expect(outcome.validatedData.namaPembeli).toBe('PT XYZ');
  });

  it('should report a field missing from the authority and leave it out of validated data', () => {
    const { jumlahDpp: _omitted, ...authoritative } = AUTHORITATIVE;
    const outcome = compareFieldSets(AUTHORITATIVE, authoritative);

    expect(outcome.deviations).toEqual([
      { field: 'jumlahDpp', kind: 'missing_in_api', documentValue: '15000000' },
    ]);
    expect('jumlahDpp' in outcome.validatedData).toBe(false);
  });

  it('should emit nothing when both sides lack a field', () => {
    const outcome = compareFieldSets({ namaPenjual: 'PT ABC' }, { namaPenjual: 'pt abc' });

    expect(outcome.deviations).toEqual([]);
    expect(outcome.validatedData).toEqual({ namaPenjual: 'pt abc' });
  });

  it('should keep deviations in schema order and independent per field', () => {
    const outcome = compareFieldSets(
      { jumlahPpn: '1', npwpPenjual: '999999999999999', tanggalFaktur: { year: 2022, month: 1, day: 4 } },
      { npwpPenjual: '012345678012000', tanggalFaktur: { year: 2022, month: 4, day: 1 } },
    );

    expect(outcome.deviations.map((d) => [d.field, d.kind])).toEqual([
      ['npwpPenjual', 'mismatch'],
      ['tanggalFaktur', 'mismatch'],
      ['jumlahPpn', 'missing_in_api'],
    ]);
    expect(outcome.message).toBe('Found 3 deviation(s) in e-Faktur data');
  });

  it('should not be affected by amount formatting once normalized', () => {
    const outcome = compareFieldSets({ jumlahDpp: '1234567' }, { jumlahDpp: '1234567.00' });
    expect(outcome.deviations).toEqual([]);
  });

  it('should freeze the outcome', () => {
    const outcome = compareFieldSets(AUTHORITATIVE, AUTHORITATIVE);

    expect(Object.isFrozen(outcome)).toBe(true);
    expect(Object.isFrozen(outcome.deviations)).toBe(true);
    expect(Object.isFrozen(outcome.validatedData)).toBe(true);
  });

  it('should report an authority value of unexpected shape as a mismatch, not as missing', () => {
    const { npwpPenjual: _omitted, ...authoritative } = AUTHORITATIVE;
    const outcome = compareFieldSets(AUTHORITATIVE, authoritative, {}, { npwpPenjual: 'N/A' });

    expect(outcome.deviations).toEqual([
      {
        field: 'npwpPenjual',
        kind: 'mismatch',
        documentValue: '012345678012000',
        authoritativeValue: 'N/A',
      },
    ]);
    expect('npwpPenjual' in outcome.validatedData).toBe(false);
  });

  it('should report an unexpected authority value the document lacks as missing in the document', () => {
    const outcome = compareFieldSets({}, {}, {}, { tanggalFaktur: '1 April 2022' });

    expect(outcome.deviations).toEqual([
      { field: 'tanggalFaktur', kind: 'missing_in_document', authoritativeValue: '1 April 2022' },
    ]);
  });

  it('should not mutate its inputs', () => {
    const documentFields: InvoiceFieldSet = { jumlahPpn: '1' };
    compareFieldSets(documentFields, AUTHORITATIVE);
    expect(documentFields).toEqual({ jumlahPpn: '1' });
  });
});

describe('createDeviationEngine', () => {
  it('should apply its configured options', () => {
    const engine = createDeviationEngine({ amountTolerance: '1000' });
    const outcome = engine.compare({ jumlahPpn: '1650500' }, { jumlahPpn: '1650000' });
    expect(outcome.status).toBe('validated_successfully');
  });
});
