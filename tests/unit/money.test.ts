import { describe, expect, it } from 'vitest';
import { formatCents, lineTotalCents, sumLineTotals, toCents } from '../../src/utils/money';

describe('toCents', () => {
  it('parses whole, one-digit and two-digit fractions', () => {
    expect(toCents('5')).toBe(500);
    expect(toCents('5.5')).toBe(550);
    expect(toCents('5.00')).toBe(500);
    expect(toCents(' 12.34 ')).toBe(1234);
  });

  it('keeps the sign of negative amounts', () => {
    expect(toCents('-1.25')).toBe(-125);
  });

  it('accepts numbers by rounding them to two places', () => {
    expect(toCents(5.5)).toBe(550);
    expect(toCents(0.1)).toBe(10);
  });

  it('rejects malformed amounts', () => {
    expect(() => toCents('abc')).toThrow(RangeError);
    expect(() => toCents('1.234')).toThrow('Invalid money amount: 1.234');
    expect(() => toCents('')).toThrow(RangeError);
  });
});

describe('formatCents', () => {
  it('renders two decimal places', () => {
    expect(formatCents(7000)).toBe('70.00');
    expect(formatCents(2250)).toBe('22.50');
    expect(formatCents(5)).toBe('0.05');
    expect(formatCents(0)).toBe('0.00');
  });

  it('renders negative amounts with a leading minus', () => {
    expect(formatCents(-5)).toBe('-0.05');
  });

  it('refuses fractional cents', () => {
    expect(() => formatCents(1.5)).toThrow('Invalid cents value: 1.5');
  });
});

describe('line totals', () => {
  it('multiplies the price by the quantity in cents', () => {
    expect(lineTotalCents('20.00', 3)).toBe(6000);
  });

  it('sums order lines exactly', () => {
    expect(sumLineTotals([
      { price: '5.00', quantity: 2 },
      { price: '20.00', quantity: 3 },
    ])).toBe('70.00');
    expect(sumLineTotals([
      { price: '0.10', quantity: 1 },
      { price: '0.20', quantity: 1 },
    ])).toBe('0.30');
  });

  it('is zero for no lines', () => {
    expect(sumLineTotals([])).toBe('0.00');
  });
});
