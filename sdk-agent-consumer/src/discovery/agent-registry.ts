import { InvalidConfigurationError, NotFoundError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { RemoteAgent } from '../remote/remote-agent.js';
import type { RemoteAgentProxy } from '../remote/remote-agent-proxy.js';
import type { AgentHandle, DescriptorReference } from '../types.js';
import type { DescriptorResolver } from './descriptor-resolver.js';

export interface AgentRegistration {
  /** Id the agent's descriptor is expected to carry. */
  agentId: string;
  /** Scratch key for this agent's output; unique within the registry. */
  role: string;
  reference: DescriptorReference;
  timeoutMs?: number;
  stream?: boolean;
}

/**
 * The agents known to one orchestration run, in registry order.
 * Immutable: a refreshed registry produces a new instance.
 */
export class KnownAgents {
  private readonly byId: Map<string, AgentHandle>;

  constructor(private readonly handles: readonly AgentHandle[]) {
    this.byId = new Map();
    const roles = new Set<string>();

    for (const handle of handles) {
      const { agentId } = handle;
      if (this.byId.has(agentId)) {
        throw new InvalidConfigurationError(`Duplicate agentId "${agentId}" in registry`, [agentId]);
      }
      if (roles.has(handle.role)) {
        throw new InvalidConfigurationError(`Duplicate role "${handle.role}" in registry`, [handle.role]);
      }
      this.byId.set(agentId, handle);
      roles.add(handle.role);
    }
  }

  list(): readonly AgentHandle[] {
    return this.handles;
  }

  has(agentId: string): boolean {
    return this.byId.has(agentId);
  }

  get(agentId: string): AgentHandle {
    const handle = this.byId.get(agentId);
    if (!handle) {
      throw new NotFoundError(agentId);
    }
    return handle;
  }

  byRole(role: string): AgentHandle | undefined {
    return this.handles.find((handle) => handle.role === role);
  }

  get size(): number {
    return this.handles.length;
  }
}

export interface AgentRegistryOptions {
  resolver: DescriptorResolver;
  proxy: RemoteAgentProxy;
  defaultTimeoutMs: number;
  logger?: Logger;
}

/**
 * Configured agent references. Every `forRun()` hands out fresh handles, so a run
 * discovers each agent when it first calls it and the next run picks up agents
 * that moved or restarted. Discovery failures belong to the agent concerned.
 */
export class AgentRegistry {
  private readonly logger: Logger;

  constructor(
    private readonly registrations: readonly AgentRegistration[],
    private readonly options: AgentRegistryOptions
  ) {
    this.logger = options.logger ?? createLogger('agent-registry');
    for (const key of ['agentId', 'role'] as const) {
      const values = registrations.map((registration) => registration[key]);
      const duplicate = values.find((value, index) => values.indexOf(value) !== index);
      if (duplicate) {
        throw new InvalidConfigurationError(`Duplicate ${key} "${duplicate}" in registry`, [duplicate]);
      }
    }
  }

  forRun(): KnownAgents {
    const handles = this.registrations.map(
      (registration) =>
        new RemoteAgent(this.options.resolver, this.options.proxy, {
          agentId: registration.agentId,
          role: registration.role,
          reference: registration.reference,
          timeoutMs: registration.timeoutMs ?? this.options.defaultTimeoutMs,
          stream: registration.stream,
        })
    );
    this.logger.debug({ agents: handles.map((handle) => handle.agentId) }, 'registry handles created');
    return new KnownAgents(handles);
  }
}
