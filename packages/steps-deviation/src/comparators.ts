/**
 * Per-field equality
 *
 * Tax IDs and serial numbers compare exactly, names through a configurable
 * normalization policy, dates as calendar dates and amounts within a
 * tolerance.
 */

import type { DecimalAmount, FieldName, FieldValueMap } from '@efaktur/contracts';
import {
  DEFAULT_AMOUNT_TOLERANCE,
  ConfigurationError,
  equalsWithin,
  isSameCalendarDate,
  isValidDecimalAmount,
} from '@efaktur/shared';

/**
 * How party names are normalized before comparison
 */
export interface NameComparisonPolicy {
  /** @default false */
  caseSensitive: boolean;
  /** Collapse runs of whitespace to one blank. @default true */
  collapseWhitespace: boolean;
  /** Compare "É" equal to "E". @default false */
  stripDiacritics: boolean;
  /** Drop punctuation ("PT. ABC" equals "PT ABC"). @default false */
  ignorePunctuation: boolean;
}

export const DEFAULT_NAME_POLICY: Readonly<NameComparisonPolicy> = {
  caseSensitive: false,
  collapseWhitespace: true,
  stripDiacritics: false,
  ignorePunctuation: false,
};

/**
 * Returns true when the two values count as equal
 */
export type Comparator<V> = (documentValue: V, authoritativeValue: V) => boolean;

export type FieldComparators = { readonly [F in FieldName]: Comparator<FieldValueMap[F]> };

export interface ComparatorOptions {
  /**
   * Amounts differing by strictly less than this are equal
   * @default '0.01'
   */
  amountTolerance?: DecimalAmount;
  namePolicy?: Partial<NameComparisonPolicy>;
}

/**
 * Apply a name policy. Leading and trailing blanks are always trimmed.
 */
export function normalizeNameForComparison(name: string, policy: NameComparisonPolicy): string {
  let result = name;
  if (policy.stripDiacritics) {
    result = result.normalize('NFD').replace(/\p{M}+/gu, '');
  }
  if (policy.ignorePunctuation) {
    result = result.replace(/[^\p{L}\p{N}\s]+/gu, ' ');
  }
  if (policy.collapseWhitespace || policy.ignorePunctuation) {
    result = result.replace(/\s+/g, ' ');
  }
  if (!policy.caseSensitive) {
    result = result.toUpperCase();
  }
  return result.trim();
}

const exact: Comparator<string> = (a, b) => a === b;

/**
 * Build the comparator table for all fields.
 *
 * @throws ConfigurationError when the amount tolerance is not a canonical decimal
 */
export function createFieldComparators(options: ComparatorOptions = {}): FieldComparators {
  const tolerance = options.amountTolerance ?? DEFAULT_AMOUNT_TOLERANCE;
  if (!isValidDecimalAmount(tolerance) || tolerance.trim().startsWith('-')) {
    throw new ConfigurationError('Amount tolerance must be a non-negative decimal', { tolerance });
  }
  const policy: NameComparisonPolicy = { ...DEFAULT_NAME_POLICY, ...options.namePolicy };

  const name: Comparator<string> = (a, b) =>
    normalizeNameForComparison(a, policy) === normalizeNameForComparison(b, policy);
  const amount: Comparator<DecimalAmount> = (a, b) => equalsWithin(a, b, tolerance);

  return {
    npwpPenjual: exact,
    namaPenjual: name,
    npwpPembeli: exact,
    namaPembeli: name,
    nomorFaktur: exact,
    tanggalFaktur: isSameCalendarDate,
    jumlahDpp: amount,
    jumlahPpn: amount,
  };
}
