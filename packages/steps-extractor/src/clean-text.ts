/**
 * Known OCR misreads on e-Faktur forms, applied in order
 */
export const OCR_CORRECTIONS: readonly (readonly [from: string, to: string])[] = [
  ['Sen Faktur', 'Seri Faktur'],
  ['NPWP |', 'NPWP :'],
  ['NPWP :', 'NPWP:'],
  ['NIKPaspor', 'NIK/Paspor'],
  ['Palak', 'Pajak'],
];

/**
 * Normalize recognized or extracted text before the extraction rules run.
 *
 * Collapses line breaks and blanks, fixes known misreads, and drops
 * characters outside ASCII (accented letters keep their base letter).
 */
export function cleanOcrText(text: string): string {
  let cleaned = text.replace(/[\r\n]+/g, '\n').replace(/[ \t]+/g, ' ');

  for (const [from, to] of OCR_CORRECTIONS) {
    cleaned = cleaned.replaceAll(from, to);
  }

  cleaned = cleaned.normalize('NFKD').replace(/[^\x00-\x7F]+/g, '');
  return cleaned.replace(/ +/g, ' ');
}
