/**
 * @efaktur/shared
 *
 * Logging, errors, and value utilities used by every pipeline stage.
 *
 * @packageDocumentation
 */

export {
  createLogger,
  createSilentLogger,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from './logging/logger.js';
export { createSafeLogger, scrubString, type SafeLoggerOptions } from './logging/safe-logger.js';
export {
  EFakturError,
  UnsupportedFormatError,
  CorruptInputError,
  QrNotFoundError,
  NetworkError,
  HttpError,
  MalformedResponseError,
  PayloadTooLargeError,
  CancelledError,
  ConfigurationError,
  isEFakturError,
  throwIfCancelled,
  type EFakturErrorCode,
} from './errors/errors.js';
export {
  generateCorrelationId,
  generateRunId,
  defaultIdGenerator,
  type IdGenerator,
} from './utils/ids.js';
export { isAllowedLookupHost, toLookupUrl } from './utils/lookup-url.js';

// Decimal amounts
export {
  normalizeAmount,
  parseMachineAmount,
  canonicalize,
  subtract,
  abs,
  compare,
  equals,
  equalsWithin,
  isValidDecimalAmount,
  DEFAULT_AMOUNT_TOLERANCE,
  MAX_DECIMAL_PLACES,
} from './decimal/decimal-utils.js';

// Calendar dates
export {
  INDONESIAN_MONTHS,
  parseDisplayDate,
  parseIsoDate,
  parseIndonesianLongDate,
  formatDisplayDate,
  isSameCalendarDate,
  isValidCalendarDate,
} from './dates/calendar-date.js';

// NPWP and serial numbers (offline shape checks)
export {
  TAX_ID_LENGTH,
  INVOICE_NUMBER_LENGTH,
  normalizeTaxId,
  validateTaxIdFormat,
  isValidTaxIdFormat,
  normalizeInvoiceNumber,
  type TaxIdValidationResult,
  type TaxIdErrorCode,
} from './npwp/index.js';

// Field value parsing
export {
  FIELD_PARSERS,
  normalizeName,
  parseFieldValue,
  setField,
  getField,
  type FieldParser,
  type FieldParserMap,
} from './fields/field-parsers.js';
