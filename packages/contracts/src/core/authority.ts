import type { DecimalAmount, InvoiceFieldSet, UnparsedFieldSet } from './fields.js';

/**
 * A line of the authority record's transaction detail
 */
export interface AuthorityLineItem {
  readonly name?: string;
  readonly unitPrice?: DecimalAmount;
  readonly quantity?: DecimalAmount;
  readonly totalPrice?: DecimalAmount;
  readonly discount?: DecimalAmount;
  readonly taxBase?: DecimalAmount;
  readonly vat?: DecimalAmount;
  readonly luxuryTaxRate?: DecimalAmount;
  readonly luxuryTax?: DecimalAmount;
}

/**
 * Status and reference data the authority returns next to the schema fields
 */
export interface AuthorityMetadata {
  /** e.g. "Faktur Valid, Sudah Diapprove oleh DJP" */
  readonly approvalStatus?: string;
  /** e.g. "Faktur Pajak Normal" */
  readonly invoiceStatus?: string;
  /** Transaction code (kdJenisTransaksi) */
  readonly transactionCode?: string;
  /** Replacement flag (fgPengganti) */
  readonly replacementFlag?: string;
  /** Luxury-goods sales tax total (jumlahPpnBm) */
  readonly luxuryTaxAmount?: DecimalAmount;
  readonly reference?: string;
  readonly lineItems: readonly AuthorityLineItem[];
}

/**
 * The authoritative record parsed into the shared schema
 */
export interface AuthorityRecord {
  readonly fields: InvoiceFieldSet;
  /** Elements the authority filled with text of an unexpected shape */
  readonly unparsedFields: UnparsedFieldSet;
  readonly metadata: AuthorityMetadata;
  /** Root element name of the response */
  readonly rootElement: string;
}
