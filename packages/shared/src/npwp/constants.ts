/**
 * Shape constants for Indonesian tax identifiers.
 */

/** Digits in an NPWP (Nomor Pokok Wajib Pajak) */
export const TAX_ID_LENGTH = 15;

/** Digits in an e-Faktur serial number (kode transaksi + status + serial) */
export const INVOICE_NUMBER_LENGTH = 16;
