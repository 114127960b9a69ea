import type { z } from 'zod';
import { getOrderSourceSettings } from '../../../config/orderSource';
import { errorMessage } from '../../../lib/domainError';
import {
  CircuitBreaker,
  DEFAULT_RETRY,
  resilientFetch,
  type ResilientFetchOptions
} from '../../../lib/integrationClient';
import { OrderSourceError } from '../errors';
import type { FetchUnfulfilledOptions, Order, OrderPage, OrderSource } from '../types';
import {
  graphqlEnvelopeSchema,
  orderLineItemsQueryDataSchema,
  orderQueryDataSchema,
  ordersQueryDataSchema,
  shopQueryDataSchema,
  type LineItemNode,
  type OrderNode
} from './graphqlSchemas';
import { normalizeOrder, toOrderGid } from './normalize';
import { ORDER_BY_ID_QUERY, ORDER_LINE_ITEMS_QUERY, SHOP_QUERY, UNFULFILLED_ORDERS_QUERY } from './queries';

export type ShopifyCredentials = {
  shopUrl: string;
  accessToken: string;
};

export type ShopifyOrderSourceOptions = {
  apiVersion?: string;
  fetch?: Partial<ResilientFetchOptions>;
};

const breakers = new Map<string, CircuitBreaker>();

function breakerFor(host: string): CircuitBreaker {
  let breaker = breakers.get(host);
  if (!breaker) {
    breaker = new CircuitBreaker(`order source ${host}`, { failureThreshold: 5, resetTimeoutMs: 30_000 });
    breakers.set(host, breaker);
  }
  return breaker;
}

/** `mystore`, `https://mystore.myshopify.com/` and `mystore.myshopify.com` all name the same shop. */
export function normalizeShopHost(shopUrl: string): string {
  const host = shopUrl.trim().replace(/^https?:\/\//i, '').replace(/\/+$/, '');
  return host.includes('.') ? host : `${host}.myshopify.com`;
}

function formatSince(since: Date): string {
  return since.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export class ShopifyOrderSource implements OrderSource {
  private readonly host: string;
  private readonly endpoint: string;
  private readonly fetchOptions: Partial<ResilientFetchOptions>;

  constructor(
    private readonly credentials: ShopifyCredentials,
    options: ShopifyOrderSourceOptions = {}
  ) {
    const settings = getOrderSourceSettings();
    this.host = normalizeShopHost(credentials.shopUrl);
    this.endpoint = `https://${this.host}/admin/api/${options.apiVersion ?? settings.apiVersion}/graphql.json`;
    this.fetchOptions = {
      timeoutMs: settings.timeoutMs,
      retry: { ...DEFAULT_RETRY, retries: settings.retries },
      circuitBreaker: breakerFor(this.host),
      ...options.fetch
    };
  }

  async testConnection(): Promise<string> {
    const data = await this.execute(SHOP_QUERY, {}, shopQueryDataSchema);
    if (!data.shop) {
      throw new OrderSourceError('No shop data returned');
    }
    return `Connected to ${data.shop.name ?? 'Unknown'} (${data.shop.email ?? 'No email'})`;
  }

  async fetchUnfulfilled(since: Date, options: FetchUnfulfilledOptions = {}): Promise<OrderPage> {
    const limit = Math.min(Math.max(options.limit ?? getOrderSourceSettings().pageSize, 1), 250);
    const data = await this.execute(
      UNFULFILLED_ORDERS_QUERY,
      {
        first: limit,
        after: options.cursor ?? null,
        query: `created_at:>'${formatSince(since)}' AND fulfillment_status:unfulfilled`
      },
      ordersQueryDataSchema
    );

    const orders: Order[] = [];
    for (const edge of data.orders.edges) {
      orders.push(await this.completeOrder(edge.node));
    }
    return {
      orders,
      pageInfo: {
        hasNextPage: data.orders.pageInfo.hasNextPage,
        endCursor: data.orders.pageInfo.endCursor ?? null
      }
    };
  }

  async getOrder(orderId: string): Promise<Order | null> {
    const data = await this.execute(ORDER_BY_ID_QUERY, { id: toOrderGid(orderId) }, orderQueryDataSchema);
    if (!data.order) {
      return null;
    }
    return this.completeOrder(data.order);
  }

  private async completeOrder(node: OrderNode): Promise<Order> {
    if (!node.lineItems?.pageInfo.hasNextPage) {
      return normalizeOrder(node);
    }
    return normalizeOrder(node, await this.fetchAllLineItems(node.id));
  }

  private async fetchAllLineItems(orderGid: string): Promise<LineItemNode[]> {
    const items: LineItemNode[] = [];
    let after: string | null = null;
    for (;;) {
      const data: z.infer<typeof orderLineItemsQueryDataSchema> = await this.execute(
        ORDER_LINE_ITEMS_QUERY,
        { id: orderGid, after },
        orderLineItemsQueryDataSchema
      );
      const connection = data.order?.lineItems;
      if (!connection) {
        return items;
      }
      items.push(...connection.edges.map((edge) => edge.node));
      if (!connection.pageInfo.hasNextPage || !connection.pageInfo.endCursor) {
        return items;
      }
      after = connection.pageInfo.endCursor;
    }
  }

  private async execute<T>(query: string, variables: Record<string, unknown>, schema: z.ZodType<T>): Promise<T> {
    let response: Response;
    try {
      response = await resilientFetch(
        this.endpoint,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'X-Shopify-Access-Token': this.credentials.accessToken
          },
          body: JSON.stringify({ query, variables })
        },
        this.fetchOptions
      );
    } catch (err) {
      throw new OrderSourceError(`Failed to connect to order source: ${errorMessage(err)}`);
    }

    if (!response.ok) {
      throw new OrderSourceError(`Order source responded with HTTP ${response.status}`, { status: response.status });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new OrderSourceError(`Order source returned invalid JSON: ${errorMessage(err)}`);
    }

    const envelope = graphqlEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new OrderSourceError('Order source returned an unexpected response');
    }
    if (envelope.data.errors && envelope.data.errors.length > 0) {
      const messages = envelope.data.errors.map((error) => error.message ?? 'Unknown error');
      throw new OrderSourceError(`GraphQL errors: ${messages.join(', ')}`);
    }
    const parsed = schema.safeParse(envelope.data.data ?? {});
    if (!parsed.success) {
      throw new OrderSourceError('Order source returned an unexpected response', {
        issues: parsed.error.flatten()
      });
    }
    return parsed.data;
  }
}
