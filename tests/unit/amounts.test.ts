import { describe, it, expect } from 'vitest';
import {
  formatUsd,
  parseMetadataRate,
  subunitToUsdCents,
  usdCentsToSubunit,
} from '../../src/domain/payments/amounts';

describe('amount conversion', () => {
  it('15,000 NGN (1,500,000 kobo) at 1500 NGN/USD is $10.00', () => {
    expect(subunitToUsdCents(1_500_000, 'NGN', 1500)).toBe(1000);
  });

  it('leaves USD subunits unchanged: 1500 cents is $15.00', () => {
    expect(subunitToUsdCents(1500, 'usd', 1500)).toBe(1500);
    expect(formatUsd(1500)).toBe('$15.00');
  });

  it('rounds to whole cents', () => {
    expect(subunitToUsdCents(1000, 'NGN', 1500)).toBe(1);
    expect(subunitToUsdCents(750, 'NGN', 1500)).toBe(1);
    expect(subunitToUsdCents(700, 'NGN', 1500)).toBe(0);
  });

  it('rejects a non-positive rate for foreign currency', () => {
    expect(() => subunitToUsdCents(100, 'NGN', 0)).toThrow('Invalid exchange rate: 0');
  });

  it('converts USD cents to kobo', () => {
    expect(usdCentsToSubunit(5000, 'NGN', 1500)).toBe(7_500_000);
    expect(usdCentsToSubunit(5000, 'USD', 1500)).toBe(5000);
    expect(usdCentsToSubunit(333, 'NGN', 1520.5)).toBe(506327);
  });
});

describe('parseMetadataRate', () => {
  it('accepts positive numbers and numeric strings', () => {
    expect(parseMetadataRate(1520.5)).toBe(1520.5);
    expect(parseMetadataRate('1500')).toBe(1500);
  });

  it('rejects absent, blank, zero and non-numeric values', () => {
    expect(parseMetadataRate(undefined)).toBeNull();
    expect(parseMetadataRate('')).toBeNull();
    expect(parseMetadataRate('0')).toBeNull();
    expect(parseMetadataRate('abc')).toBeNull();
    expect(parseMetadataRate(-3)).toBeNull();
  });
});
