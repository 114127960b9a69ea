import { DomainError, errorMessage } from '../../lib/domainError';
import type { CatalogRole } from './types';

export class CatalogUnavailableError extends DomainError {
  role: CatalogRole;

  constructor(role: CatalogRole, cause: unknown) {
    super('CATALOG_UNAVAILABLE', `${role} catalog: ${errorMessage(cause)}`, 503);
    this.role = role;
  }
}

export class CatalogNotConfiguredError extends DomainError {
  constructor(role: CatalogRole) {
    super('CATALOG_NOT_CONFIGURED', `${role === 'primary' ? 'Primary' : 'Secondary'} catalog database not configured`, 409);
  }
}

export class QuotationNumberConflictError extends DomainError {
  quotationNumber: string;

  constructor(quotationNumber: string) {
    super('QUOTATION_NUMBER_CONFLICT', `Quotation number ${quotationNumber} already exists`, 409);
    this.quotationNumber = quotationNumber;
  }
}
