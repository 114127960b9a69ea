import { describe, expect, it } from 'vitest';
import { getRequestContext, requestLogFields, runWithRequestContext, updateRequestContext } from './requestContext';

describe('request context', () => {
  it('records the store and batch on the object the request started with', () => {
    const context = { requestId: 'req-1' };

    runWithRequestContext(context, () => {
      updateRequestContext({ userId: 'admin', storeId: 4, batchId: 'batch-1' });
    });

    expect(context).toEqual({ requestId: 'req-1', userId: 'admin', storeId: 4, batchId: 'batch-1' });
  });

  it('ignores updates outside a request', () => {
    updateRequestContext({ storeId: 4 });

    expect(getRequestContext()).toBeUndefined();
    expect(requestLogFields()).toEqual({});
  });

  it('logs only the fields that are set', () => {
    const fields = runWithRequestContext({ requestId: 'req-2', userId: null, storeId: 7 }, () => requestLogFields());

    expect(fields).toEqual({ requestId: 'req-2', storeId: 7 });
  });
});
