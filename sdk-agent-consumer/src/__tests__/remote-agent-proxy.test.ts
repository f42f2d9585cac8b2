import { describe, expect, it, vi } from 'vitest';
import { RemoteError, TimeoutError, UnreachableError } from '../errors.js';
import { RemoteAgentProxy, accumulate, readChunks } from '../remote/remote-agent-proxy.js';
import type { InvocationRequest } from '../types.js';
import { descriptor, fakeFetch, jsonResponse, logger, networkFailure } from './helpers.js';

const target = descriptor('customer-data-agent', { endpoint: 'http://localhost:10020' });
const request: InvocationRequest = { query: 'Get customer information for ID 5', history: [], scratch: {} };

function ndjson(...lines: unknown[]): Response {
  return new Response(lines.map((line) => JSON.stringify(line)).join('\n') + '\n', {
    status: 200,
    headers: { 'content-type': 'application/x-ndjson' },
  });
}

describe('RemoteAgentProxy', () => {
  it('should post the request to the invoke endpoint and return the response', async () => {
    const fetch = fakeFetch(() => jsonResponse({ answer: 'Customer 5 is Ada', toolCalls: [], final: true }));
    const proxy = new RemoteAgentProxy({ fetch, logger });

    const response = await proxy.call(target, request, { timeoutMs: 1000 });

    expect(response).toEqual({ answer: 'Customer 5 is Ada', toolCalls: [], final: true });
    expect(fetch.mock.calls[0][0]).toBe('http://localhost:10020/invoke');
    expect(fetch.mock.calls[0][1]?.body).toBe(JSON.stringify(request));
  });

  it('should send a bearer token when one is issued for the agent', async () => {
    const fetch = fakeFetch(() => jsonResponse({ answer: 'ok', final: true }));
    const proxy = new RemoteAgentProxy({ fetch, logger, tokenFor: () => 'test-token' });

    await proxy.call(target, request, { timeoutMs: 1000 });

    expect(fetch.mock.calls[0][1]?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
  });

  it('should fold a streamed answer into one response', async () => {
    const toolCall = { operation: 'get_customer', args: { customer_id: 5 }, result: { id: 5, name: 'Ada' } };
    const fetch = fakeFetch(() =>
      ndjson(
        { answer: '', toolCalls: [toolCall], final: false },
        { answer: 'Customer 5 ', toolCalls: [], final: false },
        { answer: 'is Ada', toolCalls: [], final: true }
      )
    );
    const proxy = new RemoteAgentProxy({ fetch, logger });

    const response = await proxy.call(target, request, { timeoutMs: 1000, stream: true });

    expect(fetch.mock.calls[0][0]).toBe('http://localhost:10020/invoke/stream');
    expect(response).toEqual({ answer: 'Customer 5 is Ada', toolCalls: [toolCall], final: true });
  });

  it('should cancel the rest of the body once the final chunk has arrived', async () => {
    const cancel = vi.fn();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        const final = JSON.stringify({ answer: 'done', toolCalls: [], final: true });
        controller.enqueue(new TextEncoder().encode(`${final}\n{"answer":"trailing`));
      },
      cancel,
    });

    const response = await accumulate(readChunks(body, 'customer-data-agent'), 'customer-data-agent');

    expect(response).toEqual({ answer: 'done', toolCalls: [], final: true });
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('should reject a stream that ends without a final chunk', async () => {
    const proxy = new RemoteAgentProxy({ fetch: fakeFetch(() => ndjson({ answer: 'partial', final: false })), logger });

    const error = await proxy.call(target, request, { timeoutMs: 1000, stream: true }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteError);
    expect(error).toMatchObject({ payload: { kind: 'IncompleteStream', message: 'Stream ended before a final chunk' } });
  });

  it('should surface an error line in the stream as RemoteError', async () => {
    const failure = { kind: 'Unauthorized', message: 'not allowed', operation: 'delete_ticket' };
    const fetch = fakeFetch(() => ndjson({ answer: '', toolCalls: [], final: false }, { error: failure }));
    const proxy = new RemoteAgentProxy({ fetch, logger });

    const error = await proxy.call(target, request, { timeoutMs: 1000, stream: true }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteError);
    expect(error).toMatchObject({ payload: failure });
  });

  it('should carry the remote error payload unmodified', async () => {
    const payload = { kind: 'ValidationError', message: 'customer_id: Expected number', issues: ['customer_id'] };
    const fetch = fakeFetch(() => jsonResponse({ error: payload }, 400));
    const proxy = new RemoteAgentProxy({ fetch, logger });

    const error = await proxy.call(target, request, { timeoutMs: 1000 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteError);
    expect(error).toMatchObject({ agentId: 'customer-data-agent', payload });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('should wrap a non-envelope error response as HttpError', async () => {
    const fetch = fakeFetch(() => new Response('Bad Gateway', { status: 502 }));
    const proxy = new RemoteAgentProxy({ fetch, logger });

    const error = await proxy.call(target, request, { timeoutMs: 1000 }).catch((err: unknown) => err);

    expect(error).toMatchObject({
      kind: 'RemoteError',
      payload: { kind: 'HttpError', message: 'HTTP 502', status: 502, body: 'Bad Gateway' },
    });
  });

  it('should retry once when the agent is unreachable', async () => {
    let attempts = 0;
    const fetch = fakeFetch(() => {
      attempts++;
      if (attempts === 1) throw networkFailure('ECONNREFUSED');
      return jsonResponse({ answer: 'recovered', final: true });
    });
    const proxy = new RemoteAgentProxy({ fetch, logger, backoffMs: 0 });

    const response = await proxy.call(target, request, { timeoutMs: 1000 });

    expect(response.answer).toBe('recovered');
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('should raise Unreachable once retries are exhausted', async () => {
    const fetch = fakeFetch(() => {
      throw networkFailure('ENOTFOUND');
    });
    const proxy = new RemoteAgentProxy({ fetch, logger, maxRetries: 1, backoffMs: 0 });

    const error = await proxy.call(target, request, { timeoutMs: 1000 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UnreachableError);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('should not resend a request whose connection dropped after it was sent', async () => {
    const fetch = fakeFetch(() => {
      throw networkFailure('ECONNRESET');
    });
    const proxy = new RemoteAgentProxy({ fetch, logger, maxRetries: 3, backoffMs: 0 });

    const error = await proxy.call(target, request, { timeoutMs: 1000 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UnreachableError);
    expect(error).toMatchObject({ retryable: false });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('should not retry a failure that carries no connection code', async () => {
    const fetch = fakeFetch(() => {
      throw new TypeError('fetch failed');
    });
    const proxy = new RemoteAgentProxy({ fetch, logger, maxRetries: 3, backoffMs: 0 });

    await expect(proxy.call(target, request, { timeoutMs: 1000 })).rejects.toBeInstanceOf(UnreachableError);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('should raise Timeout on the deadline and never retry it', async () => {
    const fetch = fakeFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        })
    );
    const proxy = new RemoteAgentProxy({ fetch, logger, maxRetries: 3, backoffMs: 0 });

    const error = await proxy.call(target, request, { timeoutMs: 20 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ agentId: 'customer-data-agent', timeoutMs: 20 });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('should reject with the caller abort reason when cancelled', async () => {
    const fetch = fakeFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        })
    );
    const proxy = new RemoteAgentProxy({ fetch, logger });
    const controller = new AbortController();
    const reason = new Error('run over');

    const pending = proxy.call(target, request, { timeoutMs: 1000, signal: controller.signal });
    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });
});
