import type { KnownAgents } from '../discovery/agent-registry.js';
import { AllAgentsFailedError, InvalidConfigurationError, type OrchestrationError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { Synthesizer, SynthesisEntry } from '../reasoning/synthesizer.js';
import type {
  AgentDescriptor,
  AgentHandle,
  InvocationRequest,
  InvocationResponse,
  RouterResult,
  StageRecord,
} from '../types.js';
import {
  asOrchestrationError,
  buildStageRequest,
  failedStage,
  mergeOutput,
  throwIfCancelled,
  type Router,
  type RunContext,
} from './router.js';

export type AgentOutcome =
  | {
      status: 'success';
      handle: AgentHandle;
      descriptor: AgentDescriptor;
      response: InvocationResponse;
      durationMs: number;
    }
  | { status: 'failed'; handle: AgentHandle; cause: OrchestrationError; durationMs: number };

export interface ParallelRouterOptions {
  synthesizer: Synthesizer;
  logger?: Logger;
}

/**
 * Calls every known agent at once and synthesizes one answer from whatever came back.
 *
 * Each call runs under its own timeout and a failure never cancels its siblings.
 * Outcomes are handed to synthesis in registry order, whatever order they finished in.
 */
export class ParallelRouter implements Router {
  readonly mode = 'parallel' as const;
  private readonly synthesizer: Synthesizer;
  private readonly logger: Logger;

  constructor(private readonly agents: KnownAgents, options: ParallelRouterOptions) {
    if (agents.size === 0) {
      throw new InvalidConfigurationError('Parallel routing needs at least one agent');
    }
    this.synthesizer = options.synthesizer;
    this.logger = options.logger ?? createLogger('parallel-router');
  }

  async route(context: RunContext): Promise<RouterResult> {
    const request = buildStageRequest(context.query, context.state);
    const handles = this.agents.list();

    this.logger.info({ agents: handles.map((handle) => handle.agentId) }, 'fan-out started');

    const outcomes = await Promise.all(
      handles.map((handle) => this.settle(handle, { ...request, scratch: { ...request.scratch } }, context.signal))
    );
    throwIfCancelled(context.signal);

    const failures = outcomes.filter(
      (outcome): outcome is Extract<AgentOutcome, { status: 'failed' }> => outcome.status === 'failed'
    );
    if (failures.length === outcomes.length) {
      const causes: Record<string, OrchestrationError> = {};
      for (const failure of failures) {
        causes[failure.handle.agentId] = failure.cause;
      }
      throw new AllAgentsFailedError(causes);
    }

    const stages: StageRecord[] = [];
    const entries: SynthesisEntry[] = [];
    for (const outcome of outcomes) {
      const { handle } = outcome;
      const base = {
        agentId: handle.agentId,
        role: handle.role,
        displayName: outcome.status === 'success' ? outcome.descriptor.displayName : handle.agentId,
      };

      if (outcome.status === 'success') {
        mergeOutput(context.state, handle, outcome.response);
        stages.push({
          agentId: base.agentId,
          role: base.role,
          status: 'success',
          durationMs: outcome.durationMs,
          toolCalls: outcome.response.toolCalls,
        });
        entries.push({ ...base, status: 'success', content: outcome.response.answer });
      } else {
        stages.push(failedStage(handle, outcome.cause, outcome.durationMs));
        entries.push({ ...base, status: 'failed', content: `unavailable: ${outcome.cause.message}` });
      }
    }

    const answer = await this.synthesizer.synthesize(
      { query: context.query, history: context.state.turns, entries },
      context.signal
    );

    return { answer, scratch: context.state.scratch, stages };
  }

  private async settle(
    handle: AgentHandle,
    request: InvocationRequest,
    signal?: AbortSignal
  ): Promise<AgentOutcome> {
    const startedAt = Date.now();
    try {
      const descriptor = await handle.describe(signal);
      const response = await handle.invoke(request, signal);
      return { status: 'success', handle, descriptor, response, durationMs: Date.now() - startedAt };
    } catch (error) {
      const cause = asOrchestrationError(handle, error);
      this.logger.warn({ agentId: handle.agentId, kind: cause.kind }, 'agent failed during fan-out');
      return { status: 'failed', handle, cause, durationMs: Date.now() - startedAt };
    }
  }
}
