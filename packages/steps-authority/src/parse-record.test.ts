import { readFileSync } from 'node:fs';
import { describe, it, expect, vi } from 'vitest';
import { MalformedResponseError, type Logger } from '@efaktur/shared';
import { parseAuthorityRecord } from './parse-record.js';

const fixtureXml = readFileSync(new URL('../fixtures/djp-response.xml', import.meta.url), 'utf-8');

function createRecordingLogger(): { logger: Logger; warn: ReturnType<typeof vi.fn> } {
  const warn = vi.fn();
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn,
    error: vi.fn(),
    child: () => logger,
  };
  return { logger, warn };
}

describe('parseAuthorityRecord', () => {
  it('should map the DJP response onto the field schema', () => {
    const record = parseAuthorityRecord(new TextEncoder().encode(fixtureXml));

    expect(record.rootElement).toBe('resValidateFakturPm');
    expect(record.fields).toEqual({
      npwpPenjual: '012345678012000',
      namaPenjual: 'PT ABC',
      npwpPembeli: '023456789217000',
      namaPembeli: 'PT XYZ',
      nomorFaktur: '0700002212345678',
      tanggalFaktur: { year: 2022, month: 4, day: 1 },
      jumlahDpp: '15000000',
      jumlahPpn: '1650000',
    });
  });

  it('should carry status and line items as metadata', () => {
    const { metadata } = parseAuthorityRecord(fixtureXml);

    expect(metadata.approvalStatus).toBe('Faktur Valid, Sudah Diapprove oleh DJP');
    expect(metadata.invoiceStatus).toBe('Faktur Pajak Normal');
    expect(metadata.transactionCode).toBe('07');
    expect(metadata.replacementFlag).toBe('0');
    expect(metadata.reference).toBe('INV/2022/04/001');
    expect(metadata.luxuryTaxAmount).toBe('0');
    expect(metadata.lineItems).toEqual([
      {
        name: 'LAPTOP 14 INCI',
        unitPrice: '5000000',
        quantity: '3',
        totalPrice: '15000000',
        discount: '0',
        taxBase: '15000000',
        vat: '1650000',
        luxuryTaxRate: '0',
        luxuryTax: '0',
      },
    ]);
  });

  it('should leave missing and empty elements absent', () => {
    const record = parseAuthorityRecord(
      '<resValidateFakturPm><namaPenjual>PT ABC</namaPenjual><namaLawanTransaksi></namaLawanTransaksi></resValidateFakturPm>',
    );

    expect(record.fields).toEqual({ namaPenjual: 'PT ABC' });
    expect('namaPembeli' in record.fields).toBe(false);
    expect(record.unparsedFields).toEqual({});
    expect(record.metadata).toEqual({ lineItems: [] });
  });

  it('should accept an empty root element', () => {
    expect(parseAuthorityRecord('<resValidateFakturPm/>').fields).toEqual({});
  });

  it('should read plain decimals and strip namespace prefixes', () => {
    const record = parseAuthorityRecord(
      '<ns:resValidateFakturPm xmlns:ns="urn:example"><ns:jumlahPpn>1650000.00</ns:jumlahPpn></ns:resValidateFakturPm>',
    );

    expect(record.rootElement).toBe('resValidateFakturPm');
    expect(record.fields).toEqual({ jumlahPpn: '1650000' });
  });

  it('should keep unexpected shapes as text and log the element', () => {
    const { logger, warn } = createRecordingLogger();
    const record = parseAuthorityRecord(
      '<resValidateFakturPm><npwpPenjual>ABC</npwpPenjual><tanggalFaktur>31/02/2022</tanggalFaktur></resValidateFakturPm>',
      { logger },
    );

    expect(record.fields).toEqual({});
    expect(record.unparsedFields).toEqual({ npwpPenjual: 'ABC', tanggalFaktur: '31/02/2022' });
    expect(warn).toHaveBeenCalledWith('Authority values have an unexpected shape and are compared as text', {
      elements: ['npwpPenjual', 'tanggalFaktur'],
    });
  });

  it('should not hold authority identifiers to the printed lengths', () => {
    const record = parseAuthorityRecord(
      '<resValidateFakturPm><npwpPenjual>0012345678012000</npwpPenjual>' +
        '<npwpLawanTransaksi>02.345.678.9-217.000</npwpLawanTransaksi>' +
        '<nomorFaktur>070.000-22.12345678</nomorFaktur>' +
        '<tanggalFaktur>2022-04-01</tanggalFaktur></resValidateFakturPm>',
    );

    expect(record.fields).toEqual({
      npwpPenjual: '0012345678012000',
      npwpPembeli: '023456789217000',
      nomorFaktur: '0700002212345678',
      tanggalFaktur: { year: 2022, month: 4, day: 1 },
    });
    expect(record.unparsedFields).toEqual({});
  });

  it('should warn on an unexpected root but still parse', () => {
    const { logger, warn } = createRecordingLogger();
    const record = parseAuthorityRecord('<other><namaPenjual>PT ABC</namaPenjual></other>', { logger });

    expect(record.fields).toEqual({ namaPenjual: 'PT ABC' });
    expect(warn).toHaveBeenCalledWith('Unexpected authority root element', {
      expected: 'resValidateFakturPm',
      actual: 'other',
    });
  });

  it('should reject payloads that are not well-formed XML', () => {
    expect(() => parseAuthorityRecord('<resValidateFakturPm><nomorFaktur>1</resValidateFakturPm>')).toThrow(
      MalformedResponseError,
    );
    expect(() => parseAuthorityRecord('<html>Service Unavailable')).toThrow(MalformedResponseError);
    expect(() => parseAuthorityRecord('   ')).toThrow('Authority response is empty');
  });
});
