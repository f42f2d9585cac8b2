import type { DescriptorResolver } from '../discovery/descriptor-resolver.js';
import { DiscoveryError } from '../errors.js';
import type {
  AgentDescriptor,
  AgentHandle,
  DescriptorReference,
  InvocationRequest,
  InvocationResponse,
} from '../types.js';
import type { RemoteAgentProxy } from './remote-agent-proxy.js';

export interface RemoteAgentOptions {
  agentId: string;
  role: string;
  reference: DescriptorReference;
  timeoutMs: number;
  stream?: boolean;
}

/**
 * An agent reached over the network; routers only see the `AgentHandle` side of it.
 *
 * One instance serves one run. The descriptor is resolved on the first call and
 * kept for the rest of the run, so an agent that is never called is never contacted.
 */
export class RemoteAgent implements AgentHandle {
  readonly agentId: string;
  readonly role: string;
  readonly timeoutMs: number;
  private readonly reference: DescriptorReference;
  private readonly stream: boolean;
  private descriptor?: AgentDescriptor;

  constructor(
    private readonly resolver: DescriptorResolver,
    private readonly proxy: RemoteAgentProxy,
    options: RemoteAgentOptions
  ) {
    this.agentId = options.agentId;
    this.role = options.role;
    this.reference = options.reference;
    this.timeoutMs = options.timeoutMs;
    this.stream = options.stream ?? false;
  }

  async describe(signal?: AbortSignal): Promise<AgentDescriptor> {
    if (this.descriptor) {
      return this.descriptor;
    }

    const descriptor = await this.resolver.resolve(this.reference, { agentId: this.agentId, signal });
    if (descriptor.agentId !== this.agentId) {
      const source = this.reference.type === 'url' ? this.reference.baseUrl : 'inline descriptor';
      throw new DiscoveryError(
        source,
        `Descriptor at ${source} belongs to "${descriptor.agentId}", expected "${this.agentId}"`,
        { agentId: this.agentId }
      );
    }

    this.descriptor = descriptor;
    return descriptor;
  }

  async invoke(request: InvocationRequest, signal?: AbortSignal): Promise<InvocationResponse> {
    const descriptor = await this.describe(signal);
    return this.proxy.call(descriptor, request, {
      timeoutMs: this.timeoutMs,
      stream: this.stream,
      signal,
    });
  }
}
