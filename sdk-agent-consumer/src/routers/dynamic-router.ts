import type { KnownAgents } from '../discovery/agent-registry.js';
import { createLogger, type Logger } from '../logger.js';
import type { RouterResult, StageRecord } from '../types.js';
import { runPipeline, skippedStage, throwIfCancelled, type Router, type RunContext } from './router.js';
import { validateDecision, type RoutingPlanner } from './routing-decision.js';

export interface DynamicRouterOptions {
  planner: RoutingPlanner;
  /** Maximum agent invocations per run. */
  invocationBudget: number;
  logger?: Logger;
}

/**
 * Asks the planner which agents to call and in what order, then runs only
 * those as a pipeline. Agents left out are never contacted.
 */
export class DynamicRouter implements Router {
  readonly mode = 'dynamic' as const;
  private readonly planner: RoutingPlanner;
  private readonly invocationBudget: number;
  private readonly logger: Logger;

  constructor(private readonly agents: KnownAgents, options: DynamicRouterOptions) {
    this.planner = options.planner;
    this.invocationBudget = options.invocationBudget;
    this.logger = options.logger ?? createLogger('dynamic-router');
  }

  async route(context: RunContext): Promise<RouterResult> {
    const raw = await this.planner.decide(
      {
        query: context.query,
        history: context.state.turns,
        agents: this.agents.list(),
      },
      context.signal
    );
    throwIfCancelled(context.signal);

    const decision = validateDecision(raw, this.agents, this.invocationBudget);
    const selected = decision.kind === 'delegate' ? decision.selectedAgents : [];

    this.logger.info({ kind: decision.kind, selected, rationale: decision.rationale }, 'routing decision');

    const skipped: StageRecord[] = this.agents
      .list()
      .filter((handle) => !selected.includes(handle.agentId))
      .map((handle) =>
        skippedStage(handle, decision.skipReasons[handle.agentId] ?? 'not selected by routing decision')
      );

    if (decision.kind === 'answer-directly') {
      return {
        answer: decision.answer,
        scratch: context.state.scratch,
        stages: skipped,
        rationale: decision.rationale,
      };
    }

    const handles = selected.map((agentId) => this.agents.get(agentId));
    const result = await runPipeline(handles, context, this.logger);
    return { ...result, stages: [...result.stages, ...skipped], rationale: decision.rationale };
  }
}
