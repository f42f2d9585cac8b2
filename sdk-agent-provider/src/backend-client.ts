import { z } from 'zod';
import { BackendError, describeIssues, joinUrl } from '@support-mesh/agent-consumer';
import type { OperationDefinition } from './types.js';

/** What the tool broker needs from the operation backend. */
export interface OperationBackend {
  listOperations(signal?: AbortSignal): Promise<OperationDefinition[]>;
  execute(operation: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<unknown>;
}

const OperationParameterSchema = z.object({
  type: z.enum(['string', 'integer', 'number', 'boolean']),
  required: z.boolean(),
  description: z.string().optional(),
  enum: z.array(z.string()).optional(),
});

const CatalogSchema = z.object({
  operations: z.array(
    z.object({
      name: z.string().min(1),
      description: z.string().default(''),
      parameters: z.record(OperationParameterSchema).default({}),
      returns: z.string().default('object'),
      mutates: z.boolean(),
    })
  ),
});

const ResultSchema = z.object({ result: z.unknown() });

const FailureSchema = z.object({
  error: z.object({ kind: z.string(), message: z.string() }).passthrough(),
});

export interface HttpOperationBackendOptions {
  fetch?: typeof fetch;
  timeoutMs?: number;
}

/**
 * Client for the operation backend's HTTP surface.
 *
 * Network failures and 5xx answers are reported as retryable `BackendError`s;
 * a 4xx answer means the backend rejected the call and is not.
 */
export class HttpOperationBackend implements OperationBackend {
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(private readonly baseUrl: string, options: HttpOperationBackendOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  async listOperations(signal?: AbortSignal): Promise<OperationDefinition[]> {
    const body = await this.request('catalog', joinUrl(this.baseUrl, '/operations'), { method: 'GET' }, signal);
    const parsed = CatalogSchema.safeParse(body);
    if (!parsed.success) {
      throw new BackendError('catalog', `Malformed operation catalog: ${describeIssues(parsed.error).join('; ')}`, false);
    }
    return parsed.data.operations.map((operation) => ({
      name: operation.name,
      description: operation.description,
      parameters: operation.parameters,
      returns: operation.returns,
      mutates: operation.mutates,
    }));
  }

  async execute(operation: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const body = await this.request(
      operation,
      joinUrl(this.baseUrl, `/operations/${encodeURIComponent(operation)}`),
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ args }),
      },
      signal
    );
    const parsed = ResultSchema.safeParse(body);
    if (!parsed.success) {
      throw new BackendError(operation, `Malformed response for "${operation}"`, false);
    }
    return parsed.data.result;
  }

  private async request(operation: string, url: string, init: RequestInit, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onCancel = () => controller.abort();
    signal?.addEventListener('abort', onCancel, { once: true });

    let response: Response;
    try {
      response = await this.fetchImpl(url, { ...init, signal: controller.signal });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BackendError(operation, `Operation backend unreachable: ${reason}`, true, { cause: error });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCancel);
    }

    let body: unknown = null;
    try {
      body = await response.json();
    } catch (error) {
      if (response.ok) {
        throw new BackendError(operation, `Operation backend sent invalid JSON for "${operation}"`, false, { cause: error });
      }
    }

    if (!response.ok) {
      const failure = FailureSchema.safeParse(body);
      const message = failure.success ? failure.data.error.message : `HTTP ${response.status}`;
      throw new BackendError(operation, message, response.status >= 500);
    }

    return body;
  }
}
