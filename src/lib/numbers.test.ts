import { describe, expect, it } from 'vitest';
import {
  MAX_SIGNED_INT64,
  QuotationNumberOverflowError,
  parseQuotationNumber,
  quotationNumberToText,
  roundMoney,
  toNullableNumber,
  toNumber
} from './numbers';

describe('toNumber', () => {
  it('parses numeric strings and falls back to 0', () => {
    expect(toNumber('12.5')).toBe(12.5);
    expect(toNumber('abc')).toBe(0);
    expect(toNumber(null)).toBe(0);
    expect(toNumber(7)).toBe(7);
  });

  it('keeps null distinct in the nullable variant', () => {
    expect(toNullableNumber(null)).toBeNull();
    expect(toNullableNumber('')).toBeNull();
    expect(toNullableNumber('3.10')).toBe(3.1);
  });
});

describe('roundMoney', () => {
  it('rounds to cents', () => {
    expect(roundMoney(3 * 19.99)).toBe(59.97);
    expect(roundMoney(0.1 + 0.2)).toBe(0.3);
  });
});

describe('quotation number text', () => {
  it('accepts the full signed 64-bit range', () => {
    expect(quotationNumberToText(6202025001n)).toBe('6202025001');
    expect(quotationNumberToText(MAX_SIGNED_INT64)).toBe('9223372036854775807');
  });

  it('rejects values a BIGINT column cannot hold', () => {
    expect(() => quotationNumberToText(MAX_SIGNED_INT64 + 1n)).toThrow(QuotationNumberOverflowError);
    expect(() => quotationNumberToText(0n)).toThrow(QuotationNumberOverflowError);
  });

  it('parses trimmed digit strings only', () => {
    expect(parseQuotationNumber(' 6202025001 ')).toBe(6202025001n);
    expect(() => parseQuotationNumber('62-02')).toThrow('QUOTATION_NUMBER_INVALID');
    expect(() => parseQuotationNumber('9223372036854775808')).toThrow(QuotationNumberOverflowError);
  });
});
