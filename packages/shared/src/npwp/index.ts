export { TAX_ID_LENGTH, INVOICE_NUMBER_LENGTH } from './constants.js';

export {
  normalizeTaxId,
  validateTaxIdFormat,
  isValidTaxIdFormat,
  normalizeInvoiceNumber,
  type TaxIdValidationResult,
  type TaxIdErrorCode,
} from './validate.js';
