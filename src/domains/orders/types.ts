export type ShippingAddress = {
  firstName: string;
  lastName: string;
  company: string;
  address1: string;
  address2: string;
  city: string;
  province: string;
  provinceCode: string;
  zip: string;
  country: string;
  countryCode: string;
  phone: string;
};

export type OrderLineItem = {
  id: string;
  name: string;
  quantity: number;
  /** Empty when the storefront variant carries no barcode. */
  barcode: string;
  sku: string;
  unitPrice: number;
  variantTitle: string;
  productTitle: string;
};

export type OrderCustomer = {
  id: string | null;
  name: string;
  email: string;
};

export type Order = {
  /** Numeric id as a string; `gid` keeps the full global id. */
  id: string;
  gid: string;
  name: string;
  createdAt: string;
  fulfillmentStatus: string;
  note: string | null;
  totalAmount: number;
  currency: string;
  customer: OrderCustomer;
  shippingAddress: ShippingAddress | null;
  lineItems: OrderLineItem[];
};

export type OrderPage = {
  orders: Order[];
  pageInfo: { hasNextPage: boolean; endCursor: string | null };
};

export type FetchUnfulfilledOptions = {
  cursor?: string;
  limit?: number;
};

export interface OrderSource {
  fetchUnfulfilled(since: Date, options?: FetchUnfulfilledOptions): Promise<OrderPage>;
  /** Resolves to null when the order does not exist. */
  getOrder(orderId: string): Promise<Order | null>;
  /** Returns a short description of the connected shop. */
  testConnection(): Promise<string>;
}

// Placeholder some storefront exports write instead of leaving the barcode empty.
export const NO_BARCODE_SENTINEL = 'NONE';

export function isMissingBarcode(barcode: string | null | undefined): boolean {
  const trimmed = (barcode ?? '').trim();
  return trimmed === '' || trimmed.toUpperCase() === NO_BARCODE_SENTINEL;
}
