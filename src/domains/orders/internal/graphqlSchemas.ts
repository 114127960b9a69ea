import { z } from 'zod';

const text = z.string().nullish();

export const pageInfoSchema = z.object({
  hasNextPage: z.boolean(),
  endCursor: text
});

export const lineItemNodeSchema = z.object({
  id: z.string(),
  name: text,
  quantity: z.number().nullish(),
  variant: z
    .object({
      id: text,
      barcode: text,
      sku: text,
      price: text,
      title: text,
      product: z.object({ id: text, title: text }).nullish()
    })
    .nullish()
});

export const lineItemConnectionSchema = z.object({
  pageInfo: pageInfoSchema,
  edges: z.array(z.object({ node: lineItemNodeSchema }))
});

export const orderNodeSchema = z.object({
  id: z.string(),
  name: text,
  createdAt: text,
  displayFulfillmentStatus: text,
  note: text,
  totalPriceSet: z
    .object({
      shopMoney: z.object({ amount: text, currencyCode: text }).nullish()
    })
    .nullish(),
  customer: z
    .object({
      id: text,
      firstName: text,
      lastName: text,
      email: text
    })
    .nullish(),
  shippingAddress: z
    .object({
      firstName: text,
      lastName: text,
      company: text,
      address1: text,
      address2: text,
      city: text,
      province: text,
      provinceCode: text,
      zip: text,
      country: text,
      countryCodeV2: text,
      phone: text
    })
    .nullish(),
  lineItems: lineItemConnectionSchema.nullish()
});

export const ordersQueryDataSchema = z.object({
  orders: z.object({
    pageInfo: pageInfoSchema,
    edges: z.array(z.object({ node: orderNodeSchema }))
  })
});

export const orderQueryDataSchema = z.object({
  order: orderNodeSchema.nullish()
});

export const orderLineItemsQueryDataSchema = z.object({
  order: z.object({ lineItems: lineItemConnectionSchema }).nullish()
});

export const shopQueryDataSchema = z.object({
  shop: z.object({ name: text, email: text, currencyCode: text }).nullish()
});

export const graphqlEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string().optional() }).passthrough()).optional()
});

export type OrderNode = z.infer<typeof orderNodeSchema>;
export type LineItemNode = z.infer<typeof lineItemNodeSchema>;
