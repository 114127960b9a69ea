import { DomainError } from './domainError';

/**
 * Converts common numeric-like inputs into a number.
 *
 * - number => itself
 * - string => parseFloat (NaN => 0)
 * - null/undefined => 0
 * - other => Number(value) (NaN => 0)
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = parseFloat(value);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  if (value === null || value === undefined) {
    return 0;
  }
  const num = Number(value);
  return Number.isNaN(num) ? 0 : num;
}

/**
 * Same as `toNumber`, but keeps SQL NULL as null. `numeric` columns arrive from pg as strings.
 */
export function toNullableNumber(value: unknown): number | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  return toNumber(value);
}

/**
 * Rounds to 2 decimal places (currency precision).
 */
export function roundMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

// Largest value a signed 64-bit column (BIGINT) can hold.
export const MAX_SIGNED_INT64 = 9223372036854775807n;

export class QuotationNumberOverflowError extends DomainError {
  constructor(value: bigint | string) {
    super(
      'QUOTATION_NUMBER_OVERFLOW',
      `Quotation number ${value.toString()} is outside the signed 64-bit range`
    );
  }
}

/**
 * Serializes a quotation number. Every boundary that writes the number as text goes through here,
 * so a value that no longer fits in a BIGINT is rejected instead of being written.
 */
export function quotationNumberToText(value: bigint): string {
  if (value <= 0n || value > MAX_SIGNED_INT64) {
    throw new QuotationNumberOverflowError(value);
  }
  return value.toString();
}

export function parseQuotationNumber(text: string): bigint {
  const trimmed = text.trim();
  if (!/^[0-9]+$/.test(trimmed)) {
    throw new Error('QUOTATION_NUMBER_INVALID');
  }
  const value = BigInt(trimmed);
  if (value > MAX_SIGNED_INT64) {
    throw new QuotationNumberOverflowError(trimmed);
  }
  return value;
}
