import { parsePositiveInt } from './env';

export type OrderSourceSettings = {
  apiVersion: string;
  timeoutMs: number;
  retries: number;
  pageSize: number;
};

export function getOrderSourceSettings(): OrderSourceSettings {
  return {
    apiVersion: process.env.ORDER_SOURCE_API_VERSION?.trim() || '2024-01',
    timeoutMs: parsePositiveInt(process.env.ORDER_SOURCE_TIMEOUT_MS, 30_000),
    retries: parsePositiveInt(process.env.ORDER_SOURCE_RETRIES, 2),
    pageSize: Math.min(parsePositiveInt(process.env.ORDER_SOURCE_PAGE_SIZE, 50), 250)
  };
}
