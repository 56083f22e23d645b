import { describe, it, expect } from 'vitest';
import {
  normalizeAmount,
  canonicalize,
  subtract,
  compare,
  equals,
  equalsWithin,
  isValidDecimalAmount,
  parseMachineAmount,
} from './decimal-utils.js';

describe('normalizeAmount', () => {
  it('should strip thousands separators and currency prefix', () => {
    expect(normalizeAmount('1.234.567')).toBe('1234567');
    expect(normalizeAmount('1234567')).toBe('1234567');
    expect(normalizeAmount('Rp 1.234.567')).toBe('1234567');
    expect(normalizeAmount('Rp. 15.000.000')).toBe('15000000');
    expect(normalizeAmount('1,234')).toBe('1234');
  });

  it('should read the decimal separator from context', () => {
    expect(normalizeAmount('1.650.000,00')).toBe('1650000');
    expect(normalizeAmount('1,234,567.89')).toBe('1234567.89');
    expect(normalizeAmount('1234,5')).toBe('1234.5');
    expect(normalizeAmount('1.234,567')).toBe('1234.567');
    expect(normalizeAmount('12.3456')).toBe('12.3456');
  });

  it('should accept the ",-" suffix and a sign', () => {
    expect(normalizeAmount('Rp1.650.000,-')).toBe('1650000');
    expect(normalizeAmount('-1.000')).toBe('-1000');
  });

  it('should reject text that is not an amount', () => {
    expect(normalizeAmount('')).toBeUndefined();
    expect(normalizeAmount('12a')).toBeUndefined();
    expect(normalizeAmount('1.')).toBeUndefined();
    expect(normalizeAmount('1.23.456')).toBeUndefined();
  });
});

describe('canonical decimal arithmetic', () => {
  it('should canonicalize trailing zeros and signs', () => {
    expect(canonicalize('1650000.00')).toBe('1650000');
    expect(canonicalize('007.50')).toBe('7.5');
    expect(canonicalize('-0.00')).toBe('0');
  });

  it('should subtract across scales', () => {
    expect(subtract('1.5', '0.25')).toBe('1.25');
    expect(subtract('100', '250')).toBe('-150');
  });

  it('should compare numerically', () => {
    expect(compare('1650000', '1650000.00')).toBe(0);
    expect(compare('9', '10')).toBe(-1);
    expect(equals('15000000', '15000000.0')).toBe(true);
  });

  it('should treat differences below the tolerance as equal', () => {
    expect(equalsWithin('100', '100.005')).toBe(true);
    expect(equalsWithin('100', '100.01')).toBe(false);
    expect(equalsWithin('100', '100.005', '0')).toBe(false);
  });

  it('should validate canonical strings', () => {
    expect(isValidDecimalAmount('1234.5')).toBe(true);
    expect(isValidDecimalAmount('1.234,5')).toBe(false);
  });
});

describe('parseMachineAmount', () => {
  it('should read plain decimals literally', () => {
    expect(parseMachineAmount('1.000')).toBe('1');
    expect(parseMachineAmount('1650000.00')).toBe('1650000');
  });

  it('should fall back to printed rules', () => {
    expect(parseMachineAmount('1.650.000')).toBe('1650000');
    expect(parseMachineAmount('n/a')).toBeUndefined();
  });
});
