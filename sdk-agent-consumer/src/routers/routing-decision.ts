import type { KnownAgents } from '../discovery/agent-registry.js';
import { BudgetExceededError, InvalidRoutingDecisionError } from '../errors.js';
import type { AgentHandle, Turn } from '../types.js';

export const DEFAULT_CLARIFICATION =
  'Could you tell me a bit more about what you need? For account or ticket questions, please include your customer ID.';

export type RoutingDecision =
  | {
      kind: 'delegate';
      selectedAgents: string[];
      rationale: string;
      skipReasons: Record<string, string>;
    }
  | {
      kind: 'answer-directly';
      answer: string;
      rationale: string;
      skipReasons: Record<string, string>;
    };

/** What a planner may know about an agent; describing it may reach the network. */
export type PlannerAgentInfo = Pick<AgentHandle, 'agentId' | 'role' | 'describe'>;

export interface RoutingRequest {
  query: string;
  history: Turn[];
  agents: readonly PlannerAgentInfo[];
}

/** The decision step in front of dynamic routing; only its output shape matters to the router. */
export interface RoutingPlanner {
  decide(request: RoutingRequest, signal?: AbortSignal): Promise<RoutingDecision>;
}

/** Builds a decision from a plain selection; an empty selection means answering directly. */
export function decisionFromSelection(
  selectedAgents: string[],
  rationale: string,
  skipReasons: Record<string, string> = {},
  directAnswer?: string
): RoutingDecision {
  if (selectedAgents.length === 0) {
    return {
      kind: 'answer-directly',
      answer: directAnswer?.trim() || DEFAULT_CLARIFICATION,
      rationale,
      skipReasons,
    };
  }
  return { kind: 'delegate', selectedAgents, rationale, skipReasons };
}

/**
 * Checks a decision against the known agents before anything is called.
 * Unknown or repeated names fail closed; more selections than the budget allows
 * raise `BudgetExceeded`.
 */
export function validateDecision(decision: RoutingDecision, agents: KnownAgents, budget: number): RoutingDecision {
  if (decision.kind === 'answer-directly') {
    return decision;
  }

  const unknown = decision.selectedAgents.filter((agentId) => !agents.has(agentId));
  if (unknown.length > 0) {
    throw new InvalidRoutingDecisionError(unknown);
  }

  const repeated = decision.selectedAgents.filter((agentId, index) => decision.selectedAgents.indexOf(agentId) !== index);
  if (repeated.length > 0) {
    throw new InvalidRoutingDecisionError(repeated, `Routing decision selected agents more than once: ${repeated.join(', ')}`);
  }

  if (decision.selectedAgents.length > budget) {
    throw new BudgetExceededError(budget, decision.selectedAgents.length);
  }

  return decision;
}
