import { toNumber } from '../../../lib/numbers';
import type { Order, OrderLineItem, ShippingAddress } from '../types';
import type { LineItemNode, OrderNode } from './graphqlSchemas';

export function numericIdFromGid(gid: string): string {
  const segments = gid.split('/');
  return segments[segments.length - 1] ?? gid;
}

export function toOrderGid(orderId: string): string {
  return orderId.startsWith('gid://') ? orderId : `gid://shopify/Order/${orderId}`;
}

export function normalizeLineItem(node: LineItemNode): OrderLineItem {
  const variant = node.variant ?? null;
  return {
    id: node.id,
    name: node.name ?? '',
    quantity: node.quantity ?? 1,
    barcode: variant?.barcode?.trim() ?? '',
    sku: variant?.sku ?? '',
    unitPrice: toNumber(variant?.price ?? 0),
    variantTitle: variant?.title ?? '',
    productTitle: variant?.product?.title ?? ''
  };
}

function normalizeShippingAddress(node: OrderNode): ShippingAddress | null {
  const address = node.shippingAddress;
  if (!address) return null;
  return {
    firstName: address.firstName ?? '',
    lastName: address.lastName ?? '',
    company: address.company ?? '',
    address1: address.address1 ?? '',
    address2: address.address2 ?? '',
    city: address.city ?? '',
    province: address.province ?? '',
    provinceCode: address.provinceCode ?? '',
    zip: address.zip ?? '',
    country: address.country ?? '',
    countryCode: address.countryCodeV2 ?? '',
    phone: address.phone ?? ''
  };
}

/**
 * `lineItems` replaces the embedded first page when the order had more than one page of items.
 */
export function normalizeOrder(node: OrderNode, lineItems?: LineItemNode[]): Order {
  const customer = node.customer ?? null;
  const money = node.totalPriceSet?.shopMoney ?? null;
  const items = lineItems ?? (node.lineItems?.edges ?? []).map((edge) => edge.node);
  return {
    id: numericIdFromGid(node.id),
    gid: node.id,
    name: node.name ?? '',
    createdAt: node.createdAt ?? '',
    fulfillmentStatus: node.displayFulfillmentStatus ?? '',
    note: node.note ?? null,
    totalAmount: toNumber(money?.amount ?? 0),
    currency: money?.currencyCode || 'USD',
    customer: {
      id: customer?.id ? numericIdFromGid(customer.id) : null,
      name: [customer?.firstName, customer?.lastName].filter(Boolean).join(' ').trim(),
      email: customer?.email ?? ''
    },
    shippingAddress: normalizeShippingAddress(node),
    lineItems: items.map(normalizeLineItem)
  };
}

/** `gid://shopify/Order/123` and `123` both become `123`. */
export function normalizeOrderId(orderId: string): string {
  const trimmed = orderId.trim();
  return trimmed.startsWith('gid://') ? numericIdFromGid(trimmed) : trimmed;
}
