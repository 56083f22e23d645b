import type { CalendarDate } from '@efaktur/contracts';

/**
 * Indonesian month names, January first (uppercase as printed on invoices)
 */
export const INDONESIAN_MONTHS = [
  'JANUARI',
  'FEBRUARI',
  'MARET',
  'APRIL',
  'MEI',
  'JUNI',
  'JULI',
  'AGUSTUS',
  'SEPTEMBER',
  'OKTOBER',
  'NOVEMBER',
  'DESEMBER',
] as const;

const DISPLAY_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:T[\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;

function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Check that year/month/day denote a real Gregorian date
 */
export function isValidCalendarDate(date: CalendarDate): boolean {
  const { year, month, day } = date;
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return false;
  }
  if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1) {
    return false;
  }
  return day <= daysInMonth(year, month);
}

function toCalendarDate(year: number, month: number, day: number): CalendarDate | undefined {
  const date: CalendarDate = { year, month, day };
  return isValidCalendarDate(date) ? date : undefined;
}

/**
 * Parse a `DD/MM/YYYY` date. Day-first is always assumed.
 *
 * @example
 * ```typescript
 * parseDisplayDate('01/02/2024') // { year: 2024, month: 2, day: 1 }
 * parseDisplayDate('31/02/2024') // undefined
 * ```
 */
export function parseDisplayDate(text: string): CalendarDate | undefined {
  const match = DISPLAY_DATE_PATTERN.exec(text.trim());
  if (!match) {
    return undefined;
  }
  const [, day = '', month = '', year = ''] = match;
  return toCalendarDate(Number(year), Number(month), Number(day));
}

/**
 * Parse an ISO 8601 date (`2022-04-01`). A time part is ignored.
 */
export function parseIsoDate(text: string): CalendarDate | undefined {
  const match = ISO_DATE_PATTERN.exec(text.trim());
  if (!match) {
    return undefined;
  }
  const [, year = '', month = '', day = ''] = match;
  return toCalendarDate(Number(year), Number(month), Number(day));
}

/**
 * Parse a long-form Indonesian date such as `1 April 2022`
 */
export function parseIndonesianLongDate(
  day: string,
  monthName: string,
  year: string,
): CalendarDate | undefined {
  const monthIndex = INDONESIAN_MONTHS.findIndex((name) => name === monthName.trim().toUpperCase());
  if (monthIndex < 0 || !/^\d{1,2}$/.test(day) || !/^\d{4}$/.test(year)) {
    return undefined;
  }
  return toCalendarDate(Number(year), monthIndex + 1, Number(day));
}

/**
 * Format as `DD/MM/YYYY`
 */
export function formatDisplayDate(date: CalendarDate): string {
  const dd = String(date.day).padStart(2, '0');
  const mm = String(date.month).padStart(2, '0');
  const yyyy = String(date.year).padStart(4, '0');
  return `${dd}/${mm}/${yyyy}`;
}

export function isSameCalendarDate(a: CalendarDate, b: CalendarDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}
