const LINE_ITEM_FIELDS = `
  pageInfo { hasNextPage endCursor }
  edges {
    node {
      id
      name
      quantity
      variant {
        id
        barcode
        sku
        price
        title
        product { id title }
      }
    }
  }`;

const ORDER_FIELDS = `
  id
  name
  createdAt
  displayFulfillmentStatus
  note
  totalPriceSet { shopMoney { amount currencyCode } }
  customer { id firstName lastName email }
  shippingAddress {
    firstName
    lastName
    company
    address1
    address2
    city
    province
    provinceCode
    zip
    country
    countryCodeV2
    phone
  }
  lineItems(first: 250) {${LINE_ITEM_FIELDS}
  }`;

export const UNFULFILLED_ORDERS_QUERY = `
query UnfulfilledOrders($first: Int!, $after: String, $query: String!) {
  orders(first: $first, after: $after, query: $query) {
    pageInfo { hasNextPage endCursor }
    edges { node {${ORDER_FIELDS}
    } }
  }
}`;

export const ORDER_BY_ID_QUERY = `
query OrderById($id: ID!) {
  order(id: $id) {${ORDER_FIELDS}
  }
}`;

export const ORDER_LINE_ITEMS_QUERY = `
query OrderLineItems($id: ID!, $after: String) {
  order(id: $id) {
    lineItems(first: 250, after: $after) {${LINE_ITEM_FIELDS}
    }
  }
}`;

export const SHOP_QUERY = `
query Shop {
  shop { name email currencyCode }
}`;
