/**
 * Authority record parser
 *
 * Reads the DJP `resValidateFakturPm` XML document into the shared field
 * schema. Missing or empty elements become absent fields. A present value of
 * an unexpected shape is kept as text in `unparsedFields`, so comparison still
 * sees that the authority answered. Only a payload that is not well-formed XML
 * is an error.
 *
 * IMPORTANT: No field values are logged here, only element names.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import {
  FIELD_NAMES,
  type AuthorityLineItem,
  type AuthorityMetadata,
  type AuthorityRecord,
  type FieldName,
  type MutableInvoiceFieldSet,
  type UnparsedFieldSet,
} from '@efaktur/contracts';
import {
  MalformedResponseError,
  createSilentLogger,
  normalizeName,
  parseDisplayDate,
  parseFieldValue,
  parseIsoDate,
  parseMachineAmount,
  setField,
  type FieldParserMap,
  type Logger,
} from '@efaktur/shared';

/**
 * Root element of a DJP invoice validation response
 */
export const AUTHORITY_ROOT_ELEMENT = 'resValidateFakturPm';

/**
 * Element path for each schema field, relative to the root element
 */
export const AUTHORITY_FIELD_ELEMENTS: Readonly<Record<FieldName, string>> = {
  npwpPenjual: 'npwpPenjual',
  namaPenjual: 'namaPenjual',
  npwpPembeli: 'npwpLawanTransaksi',
  namaPembeli: 'namaLawanTransaksi',
  nomorFaktur: 'nomorFaktur',
  tanggalFaktur: 'tanggalFaktur',
  jumlahDpp: 'jumlahDpp',
  jumlahPpn: 'jumlahPpn',
};

function digitsOnly(raw: string): string | undefined {
  const digits = raw.replace(/\D/g, '');
  return digits === '' ? undefined : digits;
}

/**
 * The authority is the reference, so its identifiers are not held to the
 * printed lengths. Amounts are machine-written: "1.000" is one, not a thousand.
 */
export const AUTHORITY_PARSERS: FieldParserMap = {
  npwpPenjual: digitsOnly,
  namaPenjual: normalizeName,
  npwpPembeli: digitsOnly,
  namaPembeli: normalizeName,
  nomorFaktur: digitsOnly,
  tanggalFaktur: (raw) => parseDisplayDate(raw) ?? parseIsoDate(raw),
  jumlahDpp: parseMachineAmount,
  jumlahPpn: parseMachineAmount,
};

export interface ParseAuthorityRecordOptions {
  logger?: Logger;
}

type XmlNode = Record<string, unknown>;

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text content of a child element, or undefined when missing, empty or
 * structured. Repeated elements yield their first occurrence.
 */
function getTextValue(node: XmlNode, key: string): string | undefined {
  const value = node[key];
  const first: unknown = Array.isArray(value) ? value[0] : value;

  if (typeof first === 'string' || typeof first === 'number') {
    const text = String(first).trim();
    return text === '' ? undefined : text;
  }
  if (isNode(first)) {
    const content = first['#text'];
    if (typeof content === 'string' && content.trim() !== '') {
      return content.trim();
    }
  }
  return undefined;
}

function decodePayload(payload: Uint8Array | string): string {
  if (typeof payload === 'string') {
    return payload;
  }
  return new TextDecoder('utf-8').decode(payload);
}

function parseXml(xml: string): { rootElement: string; root: XmlNode } {
  if (xml.trim() === '') {
    throw new MalformedResponseError('Authority response is empty');
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new MalformedResponseError(
      `Authority response is not well-formed XML: ${validation.err.msg}`,
      { line: validation.err.line, col: validation.err.col },
    );
  }

  const parser = new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    removeNSPrefix: true,
    // Keep leading zeros of tax IDs and serial numbers
    parseTagValue: false,
    trimValues: true,
    isArray: (name) => name === 'detailTransaksi',
  });

  let parsed: unknown;
  try {
    parsed = parser.parse(xml);
  } catch (error) {
    throw new MalformedResponseError('Authority response could not be parsed', {}, { cause: error });
  }

  if (!isNode(parsed)) {
    throw new MalformedResponseError('Authority response has no root element');
  }
  const rootElement = Object.keys(parsed)[0];
  if (rootElement === undefined) {
    throw new MalformedResponseError('Authority response has no root element');
  }

  // An empty root element parses to ''
  const root = parsed[rootElement];
  return { rootElement, root: isNode(root) ? root : {} };
}

function parseLineItem(node: XmlNode): AuthorityLineItem {
  const item: Mutable<AuthorityLineItem> = {};

  const name = getTextValue(node, 'nama');
  if (name !== undefined) item.name = name;

  const amounts: readonly [Exclude<keyof AuthorityLineItem, 'name'>, string][] = [
    ['unitPrice', 'hargaSatuan'],
    ['quantity', 'jumlahBarang'],
    ['totalPrice', 'hargaTotal'],
    ['discount', 'diskon'],
    ['taxBase', 'dpp'],
    ['vat', 'ppn'],
    ['luxuryTaxRate', 'tarifPpnbm'],
    ['luxuryTax', 'ppnbm'],
  ];
  for (const [key, element] of amounts) {
    const text = getTextValue(node, element);
    const amount = text === undefined ? undefined : parseMachineAmount(text);
    if (amount !== undefined) item[key] = amount;
  }

  return item;
}

function parseMetadata(root: XmlNode): AuthorityMetadata {
  const details = root['detailTransaksi'];
  const lineItems = Array.isArray(details) ? details.filter(isNode).map(parseLineItem) : [];

  const metadata: Mutable<AuthorityMetadata> = { lineItems };

  const approvalStatus = getTextValue(root, 'statusApproval');
  if (approvalStatus !== undefined) metadata.approvalStatus = approvalStatus;

  const invoiceStatus = getTextValue(root, 'statusFaktur');
  if (invoiceStatus !== undefined) metadata.invoiceStatus = invoiceStatus;

  const transactionCode = getTextValue(root, 'kdJenisTransaksi');
  if (transactionCode !== undefined) metadata.transactionCode = transactionCode;

  const replacementFlag = getTextValue(root, 'fgPengganti');
  if (replacementFlag !== undefined) metadata.replacementFlag = replacementFlag;

  const reference = getTextValue(root, 'referensi');
  if (reference !== undefined) metadata.reference = reference;

  const luxuryTaxText = getTextValue(root, 'jumlahPpnBm');
  const luxuryTaxAmount = luxuryTaxText === undefined ? undefined : parseMachineAmount(luxuryTaxText);
  if (luxuryTaxAmount !== undefined) metadata.luxuryTaxAmount = luxuryTaxAmount;

  return metadata;
}

/**
 * Parse an authority XML payload into an {@link AuthorityRecord}.
 *
 * @throws MalformedResponseError when the payload is not well-formed XML
 */
export function parseAuthorityRecord(
  payload: Uint8Array | string,
  options: ParseAuthorityRecordOptions = {},
): AuthorityRecord {
  const logger = options.logger ?? createSilentLogger();
  const { rootElement, root } = parseXml(decodePayload(payload));

  if (rootElement !== AUTHORITY_ROOT_ELEMENT) {
    logger.warn('Unexpected authority root element', {
      expected: AUTHORITY_ROOT_ELEMENT,
      actual: rootElement,
    });
  }

  const fields: MutableInvoiceFieldSet = {};
  const unparsedFields: Mutable<UnparsedFieldSet> = {};
  const unparseable: string[] = [];

  for (const field of FIELD_NAMES) {
    const element = AUTHORITY_FIELD_ELEMENTS[field];
    const text = getTextValue(root, element);
    if (text === undefined) continue;

    if (!assignParsed(fields, field, text)) {
      unparsedFields[field] = text;
      unparseable.push(element);
    }
  }

  if (unparseable.length > 0) {
    logger.warn('Authority values have an unexpected shape and are compared as text', {
      elements: unparseable,
    });
  }

  logger.debug('Parsed authority record', {
    rootElement,
    fieldCount: Object.keys(fields).length,
  });

  return { fields, unparsedFields, metadata: parseMetadata(root), rootElement };
}

function assignParsed<F extends FieldName>(
  target: MutableInvoiceFieldSet,
  field: F,
  text: string,
): boolean {
  const value = parseFieldValue(field, text, AUTHORITY_PARSERS);
  if (value === undefined) return false;
  setField(target, field, value);
  return true;
}
