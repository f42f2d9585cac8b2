import { KnownAgents } from './discovery/agent-registry.js';
import { InvalidConfigurationError, RunTimeoutError, isOrchestrationError, toErrorPayload } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import type { RoutingPlanner } from './routers/routing-decision.js';
import { DynamicRouter } from './routers/dynamic-router.js';
import { ParallelRouter } from './routers/parallel-router.js';
import type { Router } from './routers/router.js';
import { SequentialRouter } from './routers/sequential-router.js';
import type { Synthesizer } from './reasoning/synthesizer.js';
import type {
  AgentDescriptor,
  AgentHandle,
  InvocationRequest,
  InvocationResponse,
  OrchestrationResult,
  RouterMode,
  SharedState,
  Turn,
} from './types.js';

/** Where the front door gets the agents for a run; `AgentRegistry` is the usual one. */
export interface AgentSource {
  forRun(): KnownAgents;
}

export interface OrchestratorOptions {
  mode: RouterMode;
  agents: AgentSource;
  /** Required in dynamic mode. */
  planner?: RoutingPlanner;
  /** Required in parallel mode. */
  synthesizer?: Synthesizer;
  invocationBudget?: number;
  runTimeoutMs?: number;
  logger?: Logger;
}

/** Keeps track of which agents are mid-call, for reporting a run that ran out of time. */
class TrackedAgent implements AgentHandle {
  constructor(private readonly inner: AgentHandle, private readonly inFlight: Set<string>) {}

  get agentId(): string {
    return this.inner.agentId;
  }

  get role(): string {
    return this.inner.role;
  }

  get timeoutMs(): number {
    return this.inner.timeoutMs;
  }

  describe(signal?: AbortSignal): Promise<AgentDescriptor> {
    return this.track(() => this.inner.describe(signal));
  }

  invoke(request: InvocationRequest, signal?: AbortSignal): Promise<InvocationResponse> {
    return this.track(() => this.inner.invoke(request, signal));
  }

  private async track<T>(work: () => Promise<T>): Promise<T> {
    this.inFlight.add(this.inner.agentId);
    try {
      return await work();
    } finally {
      this.inFlight.delete(this.inner.agentId);
    }
  }
}

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

/**
 * Front door of the system: takes a customer query, runs it through the
 * configured routing mode and always returns a result object. Failures come
 * back as `{ ok: false }` with a stable error kind and the agents involved.
 */
export class Orchestrator {
  readonly mode: RouterMode;
  private readonly agents: AgentSource;
  private readonly planner?: RoutingPlanner;
  private readonly synthesizer?: Synthesizer;
  private readonly invocationBudget: number;
  private readonly runTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: OrchestratorOptions) {
    if (options.mode === 'dynamic' && !options.planner) {
      throw new InvalidConfigurationError('Dynamic routing needs a routing planner', ['ROUTING_PLANNER']);
    }
    if (options.mode === 'parallel' && !options.synthesizer) {
      throw new InvalidConfigurationError('Parallel routing needs a synthesizer', ['LLM_API_KEY']);
    }

    this.mode = options.mode;
    this.agents = options.agents;
    this.planner = options.planner;
    this.synthesizer = options.synthesizer;
    this.invocationBudget = options.invocationBudget ?? 4;
    this.runTimeoutMs = options.runTimeoutMs ?? 120000;
    this.logger = options.logger ?? createLogger('orchestrator');
  }

  async handle(query: string, history: Turn[] = []): Promise<OrchestrationResult> {
    const startedAt = Date.now();
    const inFlight = new Set<string>();
    const controller = new AbortController();
    const deadline = setTimeout(() => {
      controller.abort(new RunTimeoutError(this.runTimeoutMs, [...inFlight]));
    }, this.runTimeoutMs);

    const state: SharedState = {
      turns: [...history.map((turn) => ({ ...turn })), { role: 'user', content: query, timestamp: new Date().toISOString() }],
      scratch: {},
    };

    this.logger.info({ mode: this.mode, query }, 'run started');

    try {
      const run = async () => {
        const known = this.agents.forRun();
        const tracked = new KnownAgents(known.list().map((handle) => new TrackedAgent(handle, inFlight)));
        const router = this.createRouter(tracked);
        return router.route({ query, state, signal: controller.signal });
      };

      const result = await Promise.race([run(), untilAborted(controller.signal)]);
      const durationMs = Date.now() - startedAt;
      this.logger.info({ mode: this.mode, durationMs, stages: result.stages.length }, 'run finished');

      return {
        ok: true,
        mode: this.mode,
        answer: result.answer,
        scratch: result.scratch,
        stages: result.stages,
        rationale: result.rationale,
        durationMs,
      };
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      const agents = isOrchestrationError(error) ? error.agents : [];
      const payload = toErrorPayload(error);
      this.logger.error({ mode: this.mode, kind: payload.kind, agents, err: error }, 'run failed');

      return {
        ok: false,
        mode: this.mode,
        error: { ...payload, agents },
        durationMs,
      };
    } finally {
      clearTimeout(deadline);
    }
  }

  private createRouter(agents: KnownAgents): Router {
    switch (this.mode) {
      case 'sequential':
        return new SequentialRouter(agents, { logger: this.logger });
      case 'dynamic':
        if (!this.planner) {
          throw new InvalidConfigurationError('Dynamic routing needs a routing planner', ['ROUTING_PLANNER']);
        }
        return new DynamicRouter(agents, {
          planner: this.planner,
          invocationBudget: this.invocationBudget,
          logger: this.logger,
        });
      case 'parallel':
        if (!this.synthesizer) {
          throw new InvalidConfigurationError('Parallel routing needs a synthesizer', ['LLM_API_KEY']);
        }
        return new ParallelRouter(agents, { synthesizer: this.synthesizer, logger: this.logger });
    }
  }
}
