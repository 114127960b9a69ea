export {
  NO_BARCODE_SENTINEL,
  isMissingBarcode,
  type FetchUnfulfilledOptions,
  type Order,
  type OrderCustomer,
  type OrderLineItem,
  type OrderPage,
  type OrderSource,
  type ShippingAddress
} from './types';

export { OrderSourceError } from './errors';

export {
  ShopifyOrderSource,
  normalizeShopHost,
  type ShopifyCredentials,
  type ShopifyOrderSourceOptions
} from './internal/shopifyOrderSource';

export { normalizeOrderId } from './internal/normalize';
