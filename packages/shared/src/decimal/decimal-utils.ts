/**
 * Decimal utilities for invoice amounts.
 *
 * Amounts are kept as canonical strings (DecimalAmount) and compared with
 * bigint arithmetic so large Rupiah totals never pass through floating point.
 */

import type { DecimalAmount } from '@efaktur/contracts';

/**
 * Default tolerance when comparing amounts from two sources.
 */
export const DEFAULT_AMOUNT_TOLERANCE: DecimalAmount = '0.01';

/**
 * Maximum supported decimal places.
 */
export const MAX_DECIMAL_PLACES = 8;

const CANONICAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Internal representation of a decimal value.
 */
interface DecimalValue {
  /** Integer representation (value * 10^scale), signed */
  value: bigint;
  /** Number of decimal places */
  scale: number;
}

/**
 * Parse a canonical decimal string into internal representation.
 */
function parseDecimal(str: string): DecimalValue {
  const trimmed = str.trim();
  if (!CANONICAL_PATTERN.test(trimmed)) {
    throw new Error(`Invalid decimal format: ${str}`);
  }

  const negative = trimmed.startsWith('-');
  const unsigned = negative ? trimmed.slice(1) : trimmed;
  const [intPart = '0', fracPart = ''] = unsigned.split('.');

  const magnitude = BigInt(intPart + fracPart);
  return { value: negative ? -magnitude : magnitude, scale: fracPart.length };
}

/**
 * Format a decimal value back to canonical string form.
 */
function formatDecimal(decimal: DecimalValue): DecimalAmount {
  const negative = decimal.value < 0n;
  let digits = (negative ? -decimal.value : decimal.value).toString();
  const scale = decimal.scale;

  // Pad with leading zeros so there is at least one integer digit
  while (digits.length <= scale) {
    digits = '0' + digits;
  }

  let result = scale > 0
    ? `${digits.slice(0, digits.length - scale)}.${digits.slice(digits.length - scale)}`
    : digits;

  // Drop trailing fractional zeros
  if (scale > 0) {
    result = result.replace(/\.?0+$/, '');
  }

  return negative && result !== '0' ? `-${result}` : result;
}

/**
 * Bring two decimals to the same scale.
 */
function align(a: DecimalValue, b: DecimalValue): [bigint, bigint, number] {
  const targetScale = Math.max(a.scale, b.scale);
  const aValue = a.value * 10n ** BigInt(targetScale - a.scale);
  const bValue = b.value * 10n ** BigInt(targetScale - b.scale);
  return [aValue, bValue, targetScale];
}

/**
 * Subtract two decimal amounts.
 */
export function subtract(a: DecimalAmount, b: DecimalAmount): DecimalAmount {
  const [valA, valB, scale] = align(parseDecimal(a), parseDecimal(b));
  return formatDecimal({ value: valA - valB, scale });
}

/**
 * Absolute value.
 */
export function abs(a: DecimalAmount): DecimalAmount {
  const dec = parseDecimal(a);
  return formatDecimal({ value: dec.value < 0n ? -dec.value : dec.value, scale: dec.scale });
}

/**
 * Compare two decimal amounts.
 * @returns -1 if a < b, 0 if equal, 1 if a > b
 */
export function compare(a: DecimalAmount, b: DecimalAmount): -1 | 0 | 1 {
  const [valA, valB] = align(parseDecimal(a), parseDecimal(b));
  if (valA < valB) return -1;
  if (valA > valB) return 1;
  return 0;
}

/**
 * Check if two amounts are numerically equal.
 */
export function equals(a: DecimalAmount, b: DecimalAmount): boolean {
  return compare(a, b) === 0;
}

/**
 * Check whether two amounts differ by strictly less than `tolerance`.
 * A zero tolerance means exact equality.
 */
export function equalsWithin(
  a: DecimalAmount,
  b: DecimalAmount,
  tolerance: DecimalAmount = DEFAULT_AMOUNT_TOLERANCE,
): boolean {
  if (compare(tolerance, '0') <= 0) {
    return equals(a, b);
  }
  return compare(abs(subtract(a, b)), tolerance) < 0;
}

/**
 * Check if a string is a canonical decimal amount.
 */
export function isValidDecimalAmount(value: string): boolean {
  return CANONICAL_PATTERN.test(value.trim());
}

/**
 * Canonicalize a plain decimal string ("1650000.00" -> "1650000").
 */
export function canonicalize(value: string): DecimalAmount {
  return formatDecimal(parseDecimal(value));
}

/**
 * Read an amount written by a machine (`15000000`, `1650000.00`), falling
 * back to printed-amount rules for anything else.
 */
export function parseMachineAmount(text: string): DecimalAmount | undefined {
  const trimmed = text.trim();
  return isValidDecimalAmount(trimmed) ? canonicalize(trimmed) : normalizeAmount(trimmed);
}

/**
 * Normalize a printed amount to a canonical DecimalAmount.
 *
 * Accepts an optional `Rp` currency prefix, blanks, and `.` / `,` used as
 * either thousands or decimal separators:
 * - the last separator is the decimal point when 1-2 digits follow it,
 *   or when exactly 3 follow it but the other separator kind already
 *   appears before it;
 * - otherwise every separator is a thousands separator.
 *
 * @returns the canonical amount, or undefined when the text is not an amount
 *
 * @example
 * ```typescript
 * normalizeAmount('Rp 1.234.567')   // '1234567'
 * normalizeAmount('1.650.000,00')   // '1650000'
 * normalizeAmount('1,234,567.89')   // '1234567.89'
 * normalizeAmount('12a')            // undefined
 * ```
 */
export function normalizeAmount(text: string): DecimalAmount | undefined {
  let cleaned = text
    .trim()
    .replace(/^rp\.?\s*/i, '')
    .replace(/[.,]-$/, '')
    .replace(/\s+/g, '');
  const negative = cleaned.startsWith('-');
  if (negative) {
    cleaned = cleaned.slice(1);
  }

  if (!/^\d[\d.,]*$/.test(cleaned) || /[.,]$/.test(cleaned)) {
    return undefined;
  }

  const lastSeparatorIndex = Math.max(cleaned.lastIndexOf('.'), cleaned.lastIndexOf(','));
  let intPart = cleaned;
  let fracPart = '';

  if (lastSeparatorIndex >= 0) {
    const separator = cleaned.charAt(lastSeparatorIndex);
    const other = separator === '.' ? ',' : '.';
    const head = cleaned.slice(0, lastSeparatorIndex);
    const tail = cleaned.slice(lastSeparatorIndex + 1);
    const sameSeparatorRepeats = head.includes(separator);

    const isDecimalPoint =
      !sameSeparatorRepeats &&
      (tail.length <= 2 || (tail.length !== 3 && tail.length <= MAX_DECIMAL_PLACES) ||
        (tail.length === 3 && head.includes(other)));

    if (isDecimalPoint) {
      intPart = head;
      fracPart = tail;
    }

    // Grouping separators must split the integer part into blocks of three
    const groups = intPart.split(/[.,]/);
    if (groups.length > 1 && groups.slice(1).some((g) => g.length !== 3)) {
      return undefined;
    }
    intPart = groups.join('');
  }

  const canonical = canonicalize(fracPart ? `${intPart}.${fracPart}` : intPart);
  return negative && canonical !== '0' ? `-${canonical}` : canonical;
}
