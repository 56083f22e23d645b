/**
 * Extraction rules
 *
 * Each rule anchors on a label printed on the form and captures the text that
 * follows it. Rules run in list order; the first rule that yields a value for
 * a field wins and later rules for that field are skipped.
 */

import type { FieldName, FieldValueMap } from '@efaktur/contracts';
import {
  normalizeAmount,
  normalizeInvoiceNumber,
  normalizeName,
  normalizeTaxId,
  parseDisplayDate,
  parseIndonesianLongDate,
  isValidTaxIdFormat,
} from '@efaktur/shared';

/**
 * Where a rule looks first. Party rules search their own block before the
 * whole text.
 */
export type RuleScope = 'seller' | 'buyer' | 'document';

export interface ExtractionRule<F extends FieldName = FieldName> {
  readonly field: F;
  /** The anchor label as printed on the form */
  readonly label: string;
  /** Capture groups feed `parse`; flags other than `g` are kept */
  readonly pattern: RegExp;
  readonly scope: RuleScope;
  /**
   * Which match (1-based) to use when searching the whole text
   * @default 1
   */
  readonly occurrence?: number;
  /** Shape check and conversion; undefined rejects the capture */
  readonly parse: (match: RegExpExecArray) => FieldValueMap[F] | undefined;
}

/**
 * A rule for any one field
 */
export type AnyExtractionRule = { [F in FieldName]: ExtractionRule<F> }[FieldName];

function group(match: RegExpExecArray, index = 1): string {
  return match[index] ?? '';
}

function taxId(match: RegExpExecArray): string | undefined {
  const raw = group(match);
  return isValidTaxIdFormat(raw) ? normalizeTaxId(raw) : undefined;
}

function partyName(match: RegExpExecArray): string | undefined {
  const name = normalizeName(group(match));
  // A lone capital is the start of a lowercase word, not a name
  return name !== undefined && name.length >= 2 ? name : undefined;
}

const TAX_ID_PATTERN = /NPWP[\s:|\-]*([0-9.\-]+)/;
const NAME_PATTERN = /Nama[\s:|\-]*([A-Z0-9][A-Z0-9 .,&'\-]*?)[ \t]*$/m;
const AMOUNT = String.raw`[\s:|=\-]*(?:Rp\.?\s*)?(\d+(?:[.,]\d+)*)`;

/**
 * The fixed rule list for Indonesian e-Faktur forms
 */
export const DEFAULT_EXTRACTION_RULES: readonly AnyExtractionRule[] = [
  {
    field: 'npwpPenjual',
    label: 'NPWP',
    pattern: TAX_ID_PATTERN,
    scope: 'seller',
    occurrence: 1,
    parse: taxId,
  },
  {
    field: 'namaPenjual',
    label: 'Nama',
    pattern: NAME_PATTERN,
    scope: 'seller',
    occurrence: 1,
    parse: partyName,
  },
  {
    field: 'npwpPembeli',
    label: 'NPWP',
    pattern: TAX_ID_PATTERN,
    scope: 'buyer',
    occurrence: 2,
    parse: taxId,
  },
  {
    field: 'namaPembeli',
    label: 'Nama',
    pattern: NAME_PATTERN,
    scope: 'buyer',
    occurrence: 2,
    parse: partyName,
  },
  {
    field: 'nomorFaktur',
    label: 'Kode dan Nomor Seri Faktur Pajak',
    pattern:
      /(?:Kode dan Nomor Seri Faktur Pajak|Nomor[\s:|\-]*Faktur)[\s:|\-]*([0-9.\-]+[ ]*[0-9]+)/i,
    scope: 'document',
    parse: (match) => normalizeInvoiceNumber(group(match)),
  },
  {
    field: 'tanggalFaktur',
    label: 'Tanggal Faktur',
    pattern: /(?:Tanggal[\s:|\-]*Faktur[\s:|\-]*|,\s*)(\d{1,2}\/\d{1,2}\/\d{4})/i,
    scope: 'document',
    parse: (match) => parseDisplayDate(group(match)),
  },
  {
    // Signature line: "JAKARTA, 1 April 2022"
    field: 'tanggalFaktur',
    label: '<place>, <day> <month> <year>',
    pattern: /,\s*(\d{1,2})\s+([A-Z]+)\s+(\d{4})/i,
    scope: 'document',
    parse: (match) => parseIndonesianLongDate(group(match, 1), group(match, 2), group(match, 3)),
  },
  {
    field: 'jumlahDpp',
    label: 'Dasar Pengenaan Pajak',
    pattern: new RegExp(`Dasar Pengenaan Pajak${AMOUNT}`, 'i'),
    scope: 'document',
    parse: (match) => normalizeAmount(group(match)),
  },
  {
    field: 'jumlahPpn',
    label: 'Total PPN',
    pattern: new RegExp(`Total PPN${AMOUNT}`, 'i'),
    scope: 'document',
    parse: (match) => normalizeAmount(group(match)),
  },
];
