import type {
  FieldName,
  FieldValueMap,
  InvoiceFieldSet,
  MutableInvoiceFieldSet,
} from '@efaktur/contracts';
import { normalizeAmount } from '../decimal/decimal-utils.js';
import { parseDisplayDate } from '../dates/calendar-date.js';
import { isValidTaxIdFormat, normalizeInvoiceNumber, normalizeTaxId } from '../npwp/validate.js';

/**
 * Turns raw captured text into a typed field value, or undefined when the
 * text does not have the field's shape.
 */
export type FieldParser<F extends FieldName> = (raw: string) => FieldValueMap[F] | undefined;

export type FieldParserMap = { readonly [F in FieldName]: FieldParser<F> };

/**
 * Collapse blanks and trim. Empty names are absent.
 */
export function normalizeName(raw: string): string | undefined {
  const name = raw.replace(/\s+/g, ' ').trim();
  return name === '' ? undefined : name;
}

function parseTaxId(raw: string): string | undefined {
  return isValidTaxIdFormat(raw) ? normalizeTaxId(raw) : undefined;
}

/**
 * Default parsers for printed values
 */
export const FIELD_PARSERS: FieldParserMap = {
  npwpPenjual: parseTaxId,
  namaPenjual: normalizeName,
  npwpPembeli: parseTaxId,
  namaPembeli: normalizeName,
  nomorFaktur: normalizeInvoiceNumber,
  tanggalFaktur: parseDisplayDate,
  jumlahDpp: normalizeAmount,
  jumlahPpn: normalizeAmount,
};

export function parseFieldValue<F extends FieldName>(
  field: F,
  raw: string,
  parsers: FieldParserMap = FIELD_PARSERS,
): FieldValueMap[F] | undefined {
  const parser: FieldParser<F> = parsers[field];
  return parser(raw);
}

/**
 * Set a field on a builder
 */
export function setField<F extends FieldName>(
  target: MutableInvoiceFieldSet,
  field: F,
  value: FieldValueMap[F],
): void {
  target[field] = value;
}

/**
 * Read a field from a set with its precise value type
 */
export function getField<F extends FieldName>(
  source: InvoiceFieldSet,
  field: F,
): FieldValueMap[F] | undefined {
  return source[field];
}
