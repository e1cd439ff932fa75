import { describe, expect, it } from 'vitest';
import { parseAmount } from './AmountParser.js';

describe('parseAmount', () => {
  it('should read plain and comma-grouped amounts', () => {
    expect(parseAmount('50.93')).toBe(50.93);
    expect(parseAmount('$1,234.56')).toBe(1234.56);
  });

  it('should treat parentheses, minus signs and DR as outflows', () => {
    expect(parseAmount('(1,234.56)')).toBe(-1234.56);
    expect(parseAmount('-$20.00')).toBe(-20);
    expect(parseAmount('4.50-')).toBe(-4.5);
    expect(parseAmount('75.00 DR')).toBe(-75);
  });

  it('should treat a CR suffix as an inflow', () => {
    expect(parseAmount('100.00 CR')).toBe(100);
    expect(parseAmount('-100.00CR')).toBe(100);
  });

  it('should pass finite numbers through', () => {
    expect(parseAmount(-12.5)).toBe(-12.5);
    expect(parseAmount(Number.NaN)).toBeNull();
  });

  it('should reject text and unbalanced parentheses', () => {
    expect(parseAmount('twelve')).toBeNull();
    expect(parseAmount('(50.00')).toBeNull();
    expect(parseAmount('')).toBeNull();
  });
});
