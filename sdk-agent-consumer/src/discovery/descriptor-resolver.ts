import { DiscoveryError, NotFoundError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { AGENT_CARD_WELL_KNOWN_PATH, AgentDescriptorSchema, describeIssues, joinUrl } from '../protocol.js';
import type { AgentDescriptor, DescriptorReference } from '../types.js';

export interface DescriptorResolverOptions {
  fetch?: typeof fetch;
  timeoutMs?: number;
  logger?: Logger;
}

export interface ResolveOptions {
  /** Registered id of the agent being resolved; failures are attributed to it. */
  agentId?: string;
  signal?: AbortSignal;
}

/**
 * Turns a descriptor reference into a descriptor.
 *
 * URL references are fetched from the well-known path under the base URL. Network
 * failures and malformed documents raise `DiscoveryError`; a 404 raises `NotFound`.
 * Nothing is cached here: callers keep the result for as long as a run lasts.
 */
export class DescriptorResolver {
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: DescriptorResolverOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.logger = options.logger ?? createLogger('descriptor-resolver');
  }

  async resolve(reference: DescriptorReference, options: ResolveOptions = {}): Promise<AgentDescriptor> {
    if (reference.type === 'inline') {
      return reference.descriptor;
    }
    return this.fetchDescriptor(reference.baseUrl, options);
  }

  private async fetchDescriptor(baseUrl: string, { agentId, signal }: ResolveOptions): Promise<AgentDescriptor> {
    const url = joinUrl(baseUrl, AGENT_CARD_WELL_KNOWN_PATH);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onCancel = () => controller.abort();
    signal?.addEventListener('abort', onCancel, { once: true });

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: 'GET',
          headers: { Accept: 'application/json' },
          signal: controller.signal,
        });
      } catch (error) {
        this.logger.warn({ url, agentId, err: error }, 'descriptor fetch failed');
        throw new DiscoveryError(url, `Could not fetch descriptor from ${url}`, { cause: error, agentId });
      }

      if (response.status === 404) {
        throw new NotFoundError(baseUrl, `No descriptor published at ${url}`, agentId);
      }
      if (!response.ok) {
        throw new DiscoveryError(url, `Descriptor request to ${url} failed with HTTP ${response.status}`, { agentId });
      }

      let document: unknown;
      try {
        document = await response.json();
      } catch (error) {
        throw new DiscoveryError(url, `Descriptor at ${url} is not valid JSON`, { cause: error, agentId });
      }

      const parsed = AgentDescriptorSchema.safeParse(document);
      if (!parsed.success) {
        throw new DiscoveryError(url, `Malformed descriptor at ${url}: ${describeIssues(parsed.error).join('; ')}`, {
          agentId,
        });
      }

      this.logger.info({ agentId: parsed.data.agentId, url }, 'descriptor resolved');
      return parsed.data;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCancel);
    }
  }
}
