import { describe, it, expect } from 'vitest';
import type { CompletedValidation, FailedValidation } from '@efaktur/contracts';
import { httpStatusForError, serializeFieldSet, serializeOutcome } from './serialize-outcome.js';

const COMPLETED: CompletedValidation = {
  status: 'validated_with_deviations',
  message: 'Found 2 deviation(s) in e-Faktur data',
  runId: 'run-1',
  correlationId: 'cor-1',
  deviations: [
    { field: 'jumlahPpn', kind: 'mismatch', documentValue: '1500000', authoritativeValue: '1650000' },
    { field: 'namaPembeli', kind: 'missing_in_document', authoritativeValue: 'PT XYZ' },
  ],
  validatedData: {
    namaPembeli: 'PT XYZ',
    tanggalFaktur: { year: 2022, month: 4, day: 1 },
    jumlahPpn: '1650000',
  },
  extractedData: { jumlahPpn: '1500000' },
  qrUrl: 'https://svc.efaktur.example.test/validasi/faktur/abc',
  authority: { approvalStatus: 'Faktur Valid, Sudah Diapprove oleh DJP', lineItems: [] },
};

function failed(code: FailedValidation['error']['code'], context?: Record<string, unknown>): FailedValidation {
  return {
    status: 'error',
    runId: 'run-1',
    correlationId: 'cor-1',
    message: 'failed',
    error: context === undefined ? { code } : { code, context },
    deviations: [],
    validatedData: {},
  };
}

describe('serializeFieldSet', () => {
  it('should use schema order and print dates as DD/MM/YYYY', () => {
    expect(Object.entries(serializeFieldSet(COMPLETED.validatedData))).toEqual([
      ['namaPembeli', 'PT XYZ'],
      ['tanggalFaktur', '01/04/2022'],
      ['jumlahPpn', '1650000'],
    ]);
  });
});

describe('serializeOutcome', () => {
  it('should map a completed validation to the response body', () => {
    expect(serializeOutcome(COMPLETED)).toEqual({
      statusCode: 200,
      body: {
        status: 'validated_with_deviations',
        message: 'Found 2 deviation(s) in e-Faktur data',
        validation_results: {
          deviations: [
            { field: 'jumlahPpn', pdf_value: '1500000', djp_api_value: '1650000', deviation_type: 'mismatch' },
            { field: 'namaPembeli', pdf_value: null, djp_api_value: 'PT XYZ', deviation_type: 'missing_in_pdf' },
          ],
          validated_data: { namaPembeli: 'PT XYZ', tanggalFaktur: '01/04/2022', jumlahPpn: '1650000' },
          extracted_data: { jumlahPpn: '1500000' },
          qr_url: 'https://svc.efaktur.example.test/validasi/faktur/abc',
          authority_status: 'Faktur Valid, Sudah Diapprove oleh DJP',
        },
      },
    });
  });

  it('should include the raw text when the outcome carries it', () => {
    const { body } = serializeOutcome({ ...COMPLETED, rawText: 'Faktur Pajak' });

    expect(body).toMatchObject({ validation_results: { raw_ocr_text: 'Faktur Pajak' } });
  });

  it('should map failures to an error body', () => {
    expect(serializeOutcome(failed('QR_NOT_FOUND'))).toEqual({
      statusCode: 422,
      body: { status: 'error', message: 'failed', error_code: 'QR_NOT_FOUND' },
    });
  });
});

describe('httpStatusForError', () => {
  it.each([
    ['UNSUPPORTED_FORMAT', 400],
    ['CORRUPT_INPUT', 400],
    ['PAYLOAD_TOO_LARGE', 413],
    ['QR_NOT_FOUND', 422],
    ['HTTP_ERROR', 502],
    ['MALFORMED_RESPONSE', 502],
    ['NETWORK_ERROR', 502],
    ['INTERNAL_ERROR', 500],
  ] as const)('should map %s to %i', (code, status) => {
    expect(httpStatusForError({ code })).toBe(status);
  });

  it('should map authority timeouts to 504', () => {
    expect(httpStatusForError({ code: 'NETWORK_ERROR', context: { reason: 'timeout' } })).toBe(504);
  });
});
