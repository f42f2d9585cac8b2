import { describe, expect, it } from 'vitest';
import { BackendError } from '@support-mesh/agent-consumer';
import { HttpOperationBackend } from '../backend-client.js';
import { fakeFetch, jsonResponse } from './helpers.js';

describe('HttpOperationBackend', () => {
  it('should load the operation catalog', async () => {
    const fetch = fakeFetch(() =>
      jsonResponse({
        operations: [
          {
            name: 'get_customer',
            description: 'Retrieve a customer by id.',
            parameters: { customer_id: { type: 'integer', required: true } },
            returns: 'Customer | null',
            mutates: false,
          },
        ],
      })
    );
    const backend = new HttpOperationBackend('http://localhost:8080/', { fetch });

    const catalog = await backend.listOperations();

    expect(fetch.mock.calls[0][0]).toBe('http://localhost:8080/operations');
    expect(catalog).toEqual([
      {
        name: 'get_customer',
        description: 'Retrieve a customer by id.',
        parameters: { customer_id: { type: 'integer', required: true } },
        returns: 'Customer | null',
        mutates: false,
      },
    ]);
  });

  it('should post arguments and unwrap the result', async () => {
    const fetch = fakeFetch(() => jsonResponse({ result: { id: 5, name: 'Ada Lovelace' } }));
    const backend = new HttpOperationBackend('http://localhost:8080', { fetch });

    const result = await backend.execute('get_customer', { customer_id: 5 });

    expect(result).toEqual({ id: 5, name: 'Ada Lovelace' });
    expect(fetch.mock.calls[0][0]).toBe('http://localhost:8080/operations/get_customer');
    expect(fetch.mock.calls[0][1]?.body).toBe('{"args":{"customer_id":5}}');
  });

  it('should report a rejected call as non-retryable', async () => {
    const fetch = fakeFetch(() =>
      jsonResponse({ error: { kind: 'OperationFailed', message: 'Customer with ID 99 not found' } }, 400)
    );
    const backend = new HttpOperationBackend('http://localhost:8080', { fetch });

    const error = await backend.execute('disable_customer', { customer_id: 99 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BackendError);
    expect(error).toMatchObject({ message: 'Customer with ID 99 not found', retryable: false });
  });

  it('should report a server failure as retryable', async () => {
    const fetch = fakeFetch(() => new Response('upstream down', { status: 503 }));
    const backend = new HttpOperationBackend('http://localhost:8080', { fetch });

    await expect(backend.execute('get_customer', { customer_id: 5 })).rejects.toMatchObject({
      message: 'HTTP 503',
      retryable: true,
    });
  });

  it('should report a network failure as retryable', async () => {
    const fetch = fakeFetch(() => {
      throw new TypeError('fetch failed');
    });
    const backend = new HttpOperationBackend('http://localhost:8080', { fetch });

    await expect(backend.execute('get_customer', { customer_id: 5 })).rejects.toMatchObject({
      message: 'Operation backend unreachable: fetch failed',
      retryable: true,
    });
  });
});
