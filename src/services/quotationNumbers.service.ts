import { CatalogUnavailableError, type PrimaryCatalog } from '../domains/catalog';
import { DomainError } from '../lib/domainError';
import { parseQuotationNumber } from '../lib/numbers';
import { TransferConfigurationError } from './transferErrors';

// The running sequence is zero padded to this width and widens once it outgrows it.
export const QUOTATION_SEQUENCE_MIN_DIGITS = 3;

/**
 * Service prefix + database segment + four-digit year, e.g. `62` + `0` + `2025` = `6202025`.
 */
export function quotationNumberPrefix(servicePrefix: string, dbId: string, year: number): string {
  if (!/^[0-9]{2}$/.test(servicePrefix)) {
    throw new TransferConfigurationError(`Quotation service prefix must be two digits, got "${servicePrefix}"`);
  }
  if (!/^[0-9]$/.test(dbId)) {
    throw new TransferConfigurationError(`Database id must be a single digit, got "${dbId}"`);
  }
  if (!Number.isInteger(year) || year < 1000 || year > 9999) {
    throw new TransferConfigurationError(`Year ${year} cannot be used in a quotation number`);
  }
  return `${servicePrefix}${dbId}${year}`;
}

/** The value a year's first number is counted from: `6202025000` for prefix `6202025`. */
export function quotationNumberFloor(prefix: string): bigint {
  return parseQuotationNumber(`${prefix}${'0'.repeat(QUOTATION_SEQUENCE_MIN_DIGITS)}`);
}

/**
 * MAX + 1 on the sequence part. The arithmetic stays in bigint and the result is range checked,
 * so a sequence past 2^31 - 1 keeps counting and one past the BIGINT range is rejected.
 */
export function nextQuotationNumber(prefix: string, currentMax: bigint | null): bigint {
  const floor = quotationNumberFloor(prefix);
  if (currentMax === null || currentMax <= floor) {
    return floor + 1n;
  }
  const text = currentMax.toString();
  if (!text.startsWith(prefix)) {
    return floor + 1n;
  }
  const current = text.slice(prefix.length);
  const sequence = (BigInt(current) + 1n)
    .toString()
    .padStart(Math.max(QUOTATION_SEQUENCE_MIN_DIGITS, current.length), '0');
  return parseQuotationNumber(`${prefix}${sequence}`);
}

export async function allocateQuotationNumber(primary: PrimaryCatalog, prefix: string): Promise<bigint> {
  let currentMax: bigint | null;
  try {
    currentMax = await primary.maxQuotationNumber(prefix);
  } catch (err) {
    if (err instanceof DomainError) throw err;
    throw new CatalogUnavailableError(primary.role, err);
  }
  return nextQuotationNumber(prefix, currentMax);
}
