import { getTransferSettings } from '../config/transferSettings';
import { loadTransferCatalogs } from './catalogConnections.service';
import { pgStoreSettings } from './storeSettings.service';
import { openStoreOrderSource, type Store } from './stores.service';
import { pgTransferLedger } from './transferLedger.service';
import type { TransferDependencies } from './transfers.service';

export type TransferRuntime = {
  store: Store;
  deps: TransferDependencies;
};

/** Wires the Postgres-backed ledger, settings, catalogs and the store's order source together. */
export async function buildTransferDependencies(storeId: number): Promise<TransferRuntime> {
  const { store, orderSource } = await openStoreOrderSource(storeId);
  const catalogs = await loadTransferCatalogs();
  return {
    store,
    deps: {
      orderSource,
      catalogs,
      ledger: pgTransferLedger,
      settings: pgStoreSettings,
      servicePrefix: getTransferSettings().quotationServicePrefix
    }
  };
}
