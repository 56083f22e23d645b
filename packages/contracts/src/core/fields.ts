/**
 * Decimal amount stored as a canonical string (no separators, `.` as the
 * decimal point, no trailing fractional zeros).
 *
 * Kept as a string to avoid floating-point drift on large Rupiah amounts.
 */
export type DecimalAmount = string;

/**
 * A calendar date independent of its display format.
 */
export interface CalendarDate {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  /** 1-31 */
  readonly day: number;
}

/**
 * Value type of every schema field.
 *
 * Keys are the wire names used by the tax authority (DJP) record and by the
 * JSON report, so documents and authority data share one vocabulary.
 */
export interface FieldValueMap {
  /** Seller tax ID (NPWP), digits only */
  npwpPenjual: string;
  /** Seller name */
  namaPenjual: string;
  /** Buyer tax ID (NPWP), digits only */
  npwpPembeli: string;
  /** Buyer name */
  namaPembeli: string;
  /** Invoice serial number, digits only */
  nomorFaktur: string;
  /** Invoice date */
  tanggalFaktur: CalendarDate;
  /** Tax base amount (DPP) */
  jumlahDpp: DecimalAmount;
  /** VAT amount (PPN) */
  jumlahPpn: DecimalAmount;
}

export type FieldName = keyof FieldValueMap;

export type FieldValue = FieldValueMap[FieldName];

/**
 * Fixed comparison and reporting order of the schema fields.
 */
export const FIELD_NAMES = [
  'npwpPenjual',
  'namaPenjual',
  'npwpPembeli',
  'namaPembeli',
  'nomorFaktur',
  'tanggalFaktur',
  'jumlahDpp',
  'jumlahPpn',
] as const satisfies readonly FieldName[];

/**
 * The canonical eight-field schema shared by document extraction and the
 * authoritative record.
 *
 * Every field is optional. An absent field is a missing property; it is never
 * represented as `null`, an empty string or zero.
 */
export type InvoiceFieldSet = { readonly [F in FieldName]?: FieldValueMap[F] };

/**
 * Mutable builder form of {@link InvoiceFieldSet}
 */
export type MutableInvoiceFieldSet = { [F in FieldName]?: FieldValueMap[F] };

/**
 * Present values whose text could not be read into the field's type, keyed by
 * field. A field appears here or in the matching {@link InvoiceFieldSet},
 * never both.
 */
export type UnparsedFieldSet = { readonly [F in FieldName]?: string };
