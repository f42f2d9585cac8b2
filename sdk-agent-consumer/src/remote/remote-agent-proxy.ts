import {
  OrchestrationError,
  RemoteError,
  TimeoutError,
  UnreachableError,
} from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import {
  ErrorEnvelopeSchema,
  INVOKE_PATH,
  INVOKE_STREAM_PATH,
  NDJSON_CONTENT_TYPE,
  ResponseChunkSchema,
  describeIssues,
  joinUrl,
} from '../protocol.js';
import { callWithRetry } from '../retry.js';
import type {
  AgentDescriptor,
  CallOptions,
  InvocationRequest,
  InvocationResponse,
  ResponseChunk,
} from '../types.js';

/** Codes of failures where no connection was made, so the agent never saw the request. */
const CONNECT_ERROR_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'UND_ERR_CONNECT_TIMEOUT']);

function neverConnected(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string' && CONNECT_ERROR_CODES.has(current.code)) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

export interface RemoteAgentProxyOptions {
  fetch?: typeof fetch;
  /**
   * Retries after an `Unreachable` failure where the connection was never made.
   * Timeouts and failures after the request went out are never retried.
   */
  maxRetries?: number;
  backoffMs?: number;
  /** Returns a bearer token for the target agent, if it expects one. */
  tokenFor?: (descriptor: AgentDescriptor) => string | undefined;
  logger?: Logger;
}

export interface ProxyCallOptions extends CallOptions {
  stream?: boolean;
}

/**
 * Stateless request/response exchange with one remote agent.
 *
 * Streamed answers are folded into a single response here; callers only ever
 * see the accumulated result.
 */
export class RemoteAgentProxy {
  private readonly fetchImpl: typeof fetch;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly tokenFor?: (descriptor: AgentDescriptor) => string | undefined;
  private readonly logger: Logger;

  constructor(options: RemoteAgentProxyOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.maxRetries = options.maxRetries ?? 1;
    this.backoffMs = options.backoffMs ?? 250;
    this.tokenFor = options.tokenFor;
    this.logger = options.logger ?? createLogger('remote-agent-proxy');
  }

  async call(
    descriptor: AgentDescriptor,
    request: InvocationRequest,
    options: ProxyCallOptions
  ): Promise<InvocationResponse> {
    return callWithRetry(() => this.exchange(descriptor, request, options), {
      maxRetries: this.maxRetries,
      backoffMs: this.backoffMs,
      signal: options.signal,
      isRetryable: (error) => error instanceof UnreachableError && error.retryable,
      onRetry: (error, attempt) => {
        this.logger.warn(
          { agentId: descriptor.agentId, attempt, err: error },
          'agent unreachable, retrying'
        );
      },
    });
  }

  private async exchange(
    descriptor: AgentDescriptor,
    request: InvocationRequest,
    options: ProxyCallOptions
  ): Promise<InvocationResponse> {
    const { agentId } = descriptor;
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);

    const onCancel = () => controller.abort();
    options.signal?.addEventListener('abort', onCancel, { once: true });

    const abandoned = (error: unknown): Error => {
      if (timedOut) {
        return new TimeoutError(agentId, options.timeoutMs);
      }
      if (options.signal?.aborted) {
        const reason: unknown = options.signal.reason;
        return reason instanceof Error ? reason : new Error('Call cancelled');
      }
      return error instanceof Error ? error : new Error(String(error));
    };

    try {
      if (options.signal?.aborted) {
        throw abandoned(undefined);
      }

      const headers: Record<string, string> = {
        'Content-Type': 'application/json',
        Accept: options.stream ? NDJSON_CONTENT_TYPE : 'application/json',
      };
      const token = this.tokenFor?.(descriptor);
      if (token) {
        headers['Authorization'] = `Bearer ${token}`;
      }

      const url = joinUrl(descriptor.endpoint, options.stream ? INVOKE_STREAM_PATH : INVOKE_PATH);

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: 'POST',
          headers,
          body: JSON.stringify(request),
          signal: controller.signal,
        });
      } catch (error) {
        if (timedOut || options.signal?.aborted) {
          throw abandoned(error);
        }
        throw new UnreachableError(agentId, descriptor.endpoint, { cause: error, retryable: neverConnected(error) });
      }

      try {
        if (!response.ok) {
          throw await this.remoteError(agentId, response);
        }
        if (options.stream) {
          if (!response.body) {
            throw new RemoteError(agentId, { kind: 'MalformedResponse', message: 'Streamed response has no body' });
          }
          return await accumulate(readChunks(response.body, agentId), agentId);
        }
        return parseChunk(await response.json(), agentId);
      } catch (error) {
        if (error instanceof OrchestrationError) {
          throw error;
        }
        if (timedOut || options.signal?.aborted) {
          throw abandoned(error);
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new RemoteError(agentId, { kind: 'MalformedResponse', message });
      }
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCancel);
    }
  }

  private async remoteError(agentId: string, response: Response): Promise<RemoteError> {
    const text = await response.text();
    let body: unknown = null;
    try {
      body = JSON.parse(text);
    } catch {
      body = null;
    }

    const envelope = ErrorEnvelopeSchema.safeParse(body);
    if (envelope.success) {
      return new RemoteError(agentId, envelope.data.error);
    }
    return new RemoteError(agentId, {
      kind: 'HttpError',
      message: `HTTP ${response.status}`,
      status: response.status,
      body: text.slice(0, 500),
    });
  }
}

function parseChunk(value: unknown, agentId: string): ResponseChunk {
  const parsed = ResponseChunkSchema.safeParse(value);
  if (!parsed.success) {
    throw new RemoteError(agentId, {
      kind: 'MalformedResponse',
      message: describeIssues(parsed.error).join('; '),
    });
  }
  return {
    answer: parsed.data.answer,
    toolCalls: parsed.data.toolCalls.map((call) => ({
      operation: call.operation,
      args: call.args,
      result: call.result,
    })),
    final: parsed.data.final,
  };
}

/** A line carrying an error envelope means the agent failed after the stream began. */
function decodeLine(line: string, agentId: string): ResponseChunk {
  const value: unknown = JSON.parse(line);
  const envelope = ErrorEnvelopeSchema.safeParse(value);
  if (envelope.success) {
    throw new RemoteError(agentId, envelope.data.error);
  }
  return parseChunk(value, agentId);
}

/** Lazily decodes an NDJSON body into response chunks; the body is cancelled if reading stops early. */
export async function* readChunks(
  body: ReadableStream<Uint8Array>,
  agentId: string
): AsyncGenerator<ResponseChunk> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffered = '';
  let drained = false;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        drained = true;
        break;
      }
      buffered += decoder.decode(value, { stream: true });

      let newline = buffered.indexOf('\n');
      while (newline >= 0) {
        const line = buffered.slice(0, newline).trim();
        buffered = buffered.slice(newline + 1);
        if (line) {
          yield decodeLine(line, agentId);
        }
        newline = buffered.indexOf('\n');
      }
    }

    const rest = (buffered + decoder.decode()).trim();
    if (rest) {
      yield decodeLine(rest, agentId);
    }
  } finally {
    // Consumer stopped early (final chunk or a bad line): drop the rest of the body.
    if (!drained) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Folds streamed chunks into one response: answers are concatenated and tool
 * calls kept in arrival order. The sequence must end with a final chunk.
 */
export async function accumulate(chunks: AsyncIterable<ResponseChunk>, agentId: string): Promise<InvocationResponse> {
  let answer = '';
  const toolCalls: InvocationResponse['toolCalls'] = [];

  for await (const chunk of chunks) {
    answer += chunk.answer;
    toolCalls.push(...chunk.toolCalls);
    if (chunk.final) {
      return { answer, toolCalls, final: true };
    }
  }

  throw new RemoteError(agentId, {
    kind: 'IncompleteStream',
    message: 'Stream ended before a final chunk',
  });
}
