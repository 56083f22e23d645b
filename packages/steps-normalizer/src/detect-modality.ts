/**
 * Media type and modality detection for uploads.
 */

import type { DocumentInput, Modality, SupportedMediaType } from '@efaktur/contracts';
import { UnsupportedFormatError } from '@efaktur/shared';

const MEDIA_TYPE_ALIASES: Readonly<Record<string, SupportedMediaType>> = {
  'application/pdf': 'application/pdf',
  'application/x-pdf': 'application/pdf',
  'image/jpeg': 'image/jpeg',
  'image/jpg': 'image/jpeg',
  'image/pjpeg': 'image/jpeg',
  'image/png': 'image/png',
};

const EXTENSIONS: Readonly<Record<string, SupportedMediaType>> = {
  pdf: 'application/pdf',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
};

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-
const JPEG_MAGIC = [0xff, 0xd8, 0xff];
const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** PDF readers accept junk before the header within the first KiB */
const PDF_HEADER_WINDOW = 1024;

function startsWith(content: Uint8Array, magic: readonly number[], offset = 0): boolean {
  if (content.length < offset + magic.length) return false;
  return magic.every((byte, i) => content[offset + i] === byte);
}

/**
 * Identify the media type from leading bytes
 */
export function sniffMediaType(content: Uint8Array): SupportedMediaType | undefined {
  if (startsWith(content, PNG_MAGIC)) return 'image/png';
  if (startsWith(content, JPEG_MAGIC)) return 'image/jpeg';

  const window = Math.min(content.length, PDF_HEADER_WINDOW);
  for (let offset = 0; offset + PDF_MAGIC.length <= window; offset++) {
    if (startsWith(content, PDF_MAGIC, offset)) return 'application/pdf';
  }
  return undefined;
}

function fromDeclared(mediaType: string | undefined): SupportedMediaType | undefined {
  if (mediaType === undefined) return undefined;
  const essence = mediaType.split(';')[0]?.trim().toLowerCase() ?? '';
  return MEDIA_TYPE_ALIASES[essence];
}

function fromFileName(fileName: string | undefined): SupportedMediaType | undefined {
  const match = fileName === undefined ? null : /\.([a-z0-9]+)$/i.exec(fileName.trim());
  const extension = match?.[1]?.toLowerCase();
  return extension === undefined ? undefined : EXTENSIONS[extension];
}

/**
 * Resolve the media type of an upload: declared type, then file extension,
 * then magic bytes.
 *
 * @throws UnsupportedFormatError when none identifies a PDF, JPEG or PNG
 */
export function resolveMediaType(input: DocumentInput): SupportedMediaType {
  const resolved =
    fromDeclared(input.mediaType) ?? fromFileName(input.fileName) ?? sniffMediaType(input.content);

  if (resolved === undefined) {
    throw new UnsupportedFormatError('Only PDF and JPG/PNG files are supported', {
      declaredMediaType: input.mediaType ?? null,
    });
  }
  return resolved;
}

export function detectModality(mediaType: SupportedMediaType): Modality {
  return mediaType === 'application/pdf' ? 'structured' : 'raster';
}
