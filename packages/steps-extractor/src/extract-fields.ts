/**
 * Field extractor
 *
 * Applies the ordered rule list to normalized document text. Content never
 * makes extraction fail: a label that is missing, or a capture with the wrong
 * shape, leaves the field absent.
 */

import {
  FIELD_NAMES,
  type FieldName,
  type FieldValueMap,
  type InvoiceFieldSet,
  type MutableInvoiceFieldSet,
} from '@efaktur/contracts';
import { createSilentLogger, setField, type Logger } from '@efaktur/shared';
import { cleanOcrText } from './clean-text.js';
import { DEFAULT_EXTRACTION_RULES, type AnyExtractionRule, type ExtractionRule } from './rules.js';
import { splitPartySections, type PartySections } from './sections.js';

/**
 * How a field was (or was not) found
 */
export type FieldTrace =
  | { readonly status: 'matched'; readonly label: string; readonly searched: 'section' | 'document' }
  | { readonly status: 'rejected'; readonly label: string; readonly raw: string }
  | { readonly status: 'label-not-found' };

export type ExtractionTrace = Readonly<Record<FieldName, FieldTrace>>;

export interface ExtractionResult {
  readonly fields: InvoiceFieldSet;
  readonly trace: ExtractionTrace;
  /** Text after OCR cleanup, as the rules saw it */
  readonly cleanedText: string;
}

export interface ExtractFieldsOptions {
  /** Replaces the default rule list */
  rules?: readonly AnyExtractionRule[];
  logger?: Logger;
}

type RuleOutcome<V> =
  | { kind: 'matched'; value: V; searched: 'section' | 'document' }
  | { kind: 'rejected'; raw: string }
  | { kind: 'not-found' };

function nthMatch(text: string, pattern: RegExp, occurrence: number): RegExpExecArray | undefined {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  const global = new RegExp(pattern.source, flags);
  let count = 0;
  let match: RegExpExecArray | null;
  while ((match = global.exec(text)) !== null) {
    count += 1;
    if (count === occurrence) {
      return match;
    }
    if (match[0] === '') {
      global.lastIndex += 1;
    }
  }
  return undefined;
}

function sectionFor(scope: ExtractionRule['scope'], sections: PartySections): string | undefined {
  switch (scope) {
    case 'seller':
      return sections.seller;
    case 'buyer':
      return sections.buyer;
    case 'document':
      return undefined;
  }
}

function applyRule<F extends FieldName>(
  rule: ExtractionRule<F>,
  text: string,
  sections: PartySections,
): RuleOutcome<FieldValueMap[F]> {
  let rejected: string | undefined;

  const section = sectionFor(rule.scope, sections);
  if (section !== undefined) {
    const match = nthMatch(section, rule.pattern, 1);
    if (match) {
      const value = rule.parse(match);
      if (value !== undefined) {
        return { kind: 'matched', value, searched: 'section' };
      }
      rejected = match[0];
    }
  }

  const match = nthMatch(text, rule.pattern, rule.occurrence ?? 1);
  if (match) {
    const value = rule.parse(match);
    if (value !== undefined) {
      return { kind: 'matched', value, searched: 'document' };
    }
    rejected = match[0];
  }

  return rejected === undefined ? { kind: 'not-found' } : { kind: 'rejected', raw: rejected };
}

/**
 * Extract the schema fields from document text.
 *
 * @example
 * ```typescript
 * const { fields } = extractFields('Total PPN 1.650.000,00');
 * // fields = { jumlahPpn: '1650000' }
 * ```
 */
export function extractFields(text: string, options: ExtractFieldsOptions = {}): ExtractionResult {
  const rules = options.rules ?? DEFAULT_EXTRACTION_RULES;
  const logger = options.logger ?? createSilentLogger();

  const cleanedText = cleanOcrText(text);
  const sections = splitPartySections(cleanedText);

  const fields: MutableInvoiceFieldSet = {};
  const trace: Record<FieldName, FieldTrace> = {
    npwpPenjual: { status: 'label-not-found' },
    namaPenjual: { status: 'label-not-found' },
    npwpPembeli: { status: 'label-not-found' },
    namaPembeli: { status: 'label-not-found' },
    nomorFaktur: { status: 'label-not-found' },
    tanggalFaktur: { status: 'label-not-found' },
    jumlahDpp: { status: 'label-not-found' },
    jumlahPpn: { status: 'label-not-found' },
  };

  for (const rule of rules) {
    if (rule.field in fields) {
      continue;
    }

    const outcome = applyRule(rule, cleanedText, sections);
    if (outcome.kind === 'matched') {
      setField(fields, rule.field, outcome.value);
      trace[rule.field] = { status: 'matched', label: rule.label, searched: outcome.searched };
    } else if (outcome.kind === 'rejected') {
      trace[rule.field] = { status: 'rejected', label: rule.label, raw: outcome.raw };
    }
  }

  logger.debug('Field extraction finished', {
    sections: {
      seller: sections.seller !== undefined,
      buyer: sections.buyer !== undefined,
    },
    fields: Object.fromEntries(FIELD_NAMES.map((field) => [field, trace[field].status])),
  });

  return { fields, trace, cleanedText };
}
