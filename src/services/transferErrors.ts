import { DomainError } from '../lib/domainError';

/** Store configuration a transfer needs is missing or points at nothing. */
export class TransferConfigurationError extends DomainError {
  constructor(message: string) {
    super('TRANSFER_CONFIGURATION', message, 409);
  }
}

/** The ledger already holds a success row for this (store, order) pair. */
export class DuplicateTransferError extends DomainError {
  constructor(storeId: number, orderId: string) {
    super('TRANSFER_DUPLICATE', `Order ${orderId} already has a successful transfer for store ${storeId}`, 409);
  }
}
