import { describe, it, expect } from 'vitest';
import { UnsupportedFormatError } from '@efaktur/shared';
import { detectModality, resolveMediaType, sniffMediaType } from './detect-modality.js';

const PDF_BYTES = new TextEncoder().encode('%PDF-1.7\n%âã');
const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]);
const JPEG_BYTES = new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]);
const TEXT_BYTES = new TextEncoder().encode('plain text');

describe('sniffMediaType', () => {
  it('should recognise PDF, PNG and JPEG signatures', () => {
    expect(sniffMediaType(PDF_BYTES)).toBe('application/pdf');
    expect(sniffMediaType(PNG_BYTES)).toBe('image/png');
    expect(sniffMediaType(JPEG_BYTES)).toBe('image/jpeg');
  });

  it('should find a PDF header after leading junk', () => {
    const bytes = new Uint8Array([0x0a, 0x0a, ...PDF_BYTES]);
    expect(sniffMediaType(bytes)).toBe('application/pdf');
  });

  it('should return undefined for anything else', () => {
    expect(sniffMediaType(TEXT_BYTES)).toBeUndefined();
    expect(sniffMediaType(new Uint8Array([0xff]))).toBeUndefined();
  });
});

describe('resolveMediaType', () => {
  it('should prefer the declared media type', () => {
    expect(resolveMediaType({ content: PNG_BYTES, mediaType: 'application/pdf' })).toBe('application/pdf');
  });

  it('should accept parameters and aliases in the declared type', () => {
    expect(resolveMediaType({ content: TEXT_BYTES, mediaType: 'Image/JPG; charset=binary' })).toBe('image/jpeg');
  });

  it('should fall back to the file extension', () => {
    expect(
      resolveMediaType({ content: TEXT_BYTES, mediaType: 'application/octet-stream', fileName: 'faktur.PNG' }),
    ).toBe('image/png');
  });

  it('should fall back to magic bytes', () => {
    expect(resolveMediaType({ content: JPEG_BYTES, fileName: 'upload' })).toBe('image/jpeg');
  });

  it('should reject unsupported uploads', () => {
    expect(() => resolveMediaType({ content: TEXT_BYTES, mediaType: 'text/plain', fileName: 'a.txt' })).toThrow(
      UnsupportedFormatError,
    );
  });
});

describe('detectModality', () => {
  it('should treat PDFs as structured and images as raster', () => {
    expect(detectModality('application/pdf')).toBe('structured');
    expect(detectModality('image/png')).toBe('raster');
    expect(detectModality('image/jpeg')).toBe('raster');
  });
});
