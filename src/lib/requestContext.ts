import { AsyncLocalStorage } from 'node:async_hooks';

export type RequestContext = {
  requestId: string;
  userId?: string | null;
  /** Store the request works on, once a route has resolved it. */
  storeId?: number;
  /** Set while a transfer batch runs inside the request. */
  batchId?: string;
};

export type RequestLogFields = Partial<RequestContext>;

const storage = new AsyncLocalStorage<RequestContext>();

export function runWithRequestContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

/** Mutates the active context in place, so holders of the same object (the access log) see the change. */
export function updateRequestContext(patch: Partial<Omit<RequestContext, 'requestId'>>): void {
  const store = storage.getStore();
  if (!store) return;
  Object.assign(store, patch);
}

/** The context fields that are set, for spreading into a log line. */
export function requestLogFields(context: RequestContext | undefined = storage.getStore()): RequestLogFields {
  if (!context) return {};
  const fields: RequestLogFields = { requestId: context.requestId };
  if (context.userId) fields.userId = context.userId;
  if (context.storeId !== undefined) fields.storeId = context.storeId;
  if (context.batchId !== undefined) fields.batchId = context.batchId;
  return fields;
}
