import { describe, expect, it } from 'vitest';
import { formatCurrency, formatFixed, formatPercent } from './utils';

describe('formatCurrency precision tiers', () => {
  it('uses 2 decimals with thousands separators at or above $1', () => {
    expect(formatCurrency(1234.5)).toBe('$1,234.50');
    expect(formatCurrency(1)).toBe('$1.00');
    expect(formatCurrency(1234567.891)).toBe('$1,234,567.89');
  });

  it('uses 4 decimals from $0.01 up to $1', () => {
    expect(formatCurrency(0.05)).toBe('$0.0500');
    expect(formatCurrency(0.01)).toBe('$0.0100');
  });

  it('uses 6 decimals from $0.0001 up to $0.01', () => {
    expect(formatCurrency(0.0056)).toBe('$0.005600');
    expect(formatCurrency(0.0001)).toBe('$0.000100');
  });

  it('uses 8 decimals below $0.0001 and for zero', () => {
    expect(formatCurrency(0.00001234)).toBe('$0.00001234');
    expect(formatCurrency(0)).toBe('$0.00000000');
    expect(formatCurrency(-0)).toBe('$0.00000000');
  });

  it('drops the sign of negatives that round to zero', () => {
    expect(formatCurrency(-1e-12)).toBe('$0.00000000');
    expect(formatCurrency(-0.000000004)).toBe('$0.00000000');
    expect(formatCurrency(-0.000000006)).toBe('$-0.00000001');
  });

  it('picks the tier from the magnitude and keeps the sign after the symbol', () => {
    expect(formatCurrency(-1234.5)).toBe('$-1,234.50');
    expect(formatCurrency(-0.0056)).toBe('$-0.005600');
  });

  it('rounds exact binary ties to even', () => {
    expect(formatCurrency(2.125)).toBe('$2.12');
    expect(formatCurrency(2.375)).toBe('$2.38');
  });

  it('rounds on the stored binary value, not the shortest decimal form', () => {
    // 0.12345 is stored just above the midpoint, 2.675 and 1.015 just below
    expect(formatCurrency(0.12345)).toBe('$0.1235');
    expect(formatCurrency(2.675)).toBe('$2.67');
    expect(formatCurrency(1.015)).toBe('$1.01');
  });
});

describe('formatFixed / formatPercent', () => {
  it('omits grouping unless asked', () => {
    expect(formatFixed(25000, 2)).toBe('25000.00');
    expect(formatFixed(25000, 2, true)).toBe('25,000.00');
  });

  it('handles magnitudes beyond the plain-decimal range', () => {
    expect(formatFixed(1e21, 2)).toBe('1000000000000000000000.00');
    expect(formatFixed(-0.001, 2)).toBe('0.00');
  });

  it('appends a percent sign', () => {
    expect(formatPercent(185.71428571428572, 1)).toBe('185.7%');
    expect(formatPercent(105)).toBe('105.00%');
  });
});
