import { z } from 'zod';
import { InvalidRoutingDecisionError } from '../errors.js';
import { sanitizeModelJSON, type ChatCompleter } from '../llm-service.js';
import { createLogger, type Logger } from '../logger.js';
import { describeIssues } from '../protocol.js';
import {
  decisionFromSelection,
  type RoutingDecision,
  type RoutingPlanner,
  type RoutingRequest,
} from '../routers/routing-decision.js';
import type { AgentDescriptor } from '../types.js';

export type Urgency = 'low' | 'medium' | 'high';

export interface QueryIntent {
  needsData: boolean;
  needsSupport: boolean;
  urgency: Urgency;
  executionMode: 'sequential' | 'data_only' | 'support_only' | 'clarify';
}

const DATA_KEYWORDS = ['customer', 'ticket', 'id', 'list', 'search', 'account', 'history', 'status'];
const SUPPORT_KEYWORDS = [
  'help', 'issue', 'problem', 'reset', 'fix', 'error', 'cannot', "can't",
  'broken', 'refund', 'billing', 'upgrade', 'cancel', 'support',
];
const URGENT_KEYWORDS = ['urgent', 'immediately', 'asap', 'critical'];

function mentions(tokens: Set<string>, keywords: string[]): boolean {
  return keywords.some((keyword) => tokens.has(keyword) || tokens.has(`${keyword}s`) || tokens.has(`${keyword}es`));
}

export function analyzeQueryIntent(query: string): QueryIntent {
  const tokens = new Set(query.toLowerCase().match(/[a-z']+/g) ?? []);
  const needsData = mentions(tokens, DATA_KEYWORDS) || /\d/.test(query);
  const needsSupport = mentions(tokens, SUPPORT_KEYWORDS);

  let urgency: Urgency = 'low';
  if (mentions(tokens, URGENT_KEYWORDS)) {
    urgency = 'high';
  } else if (needsSupport) {
    urgency = 'medium';
  }

  let executionMode: QueryIntent['executionMode'] = 'clarify';
  if (needsData && needsSupport) executionMode = 'sequential';
  else if (needsData) executionMode = 'data_only';
  else if (needsSupport) executionMode = 'support_only';

  return { needsData, needsSupport, urgency, executionMode };
}

export interface KeywordRoutingPlannerOptions {
  dataRole?: string;
  supportRole?: string;
}

/** Routes on keywords alone: data first when customer data is needed, then support. */
export class KeywordRoutingPlanner implements RoutingPlanner {
  private readonly dataRole: string;
  private readonly supportRole: string;

  constructor(options: KeywordRoutingPlannerOptions = {}) {
    this.dataRole = options.dataRole ?? 'data';
    this.supportRole = options.supportRole ?? 'support';
  }

  async decide(request: RoutingRequest): Promise<RoutingDecision> {
    const intent = analyzeQueryIntent(request.query);
    const wanted = new Map<string, boolean>([
      [this.dataRole, intent.needsData],
      [this.supportRole, intent.needsSupport],
    ]);

    const selected: string[] = [];
    const skipReasons: Record<string, string> = {};
    const missingRoles: string[] = [];

    for (const role of [this.dataRole, this.supportRole]) {
      if (!wanted.get(role)) continue;
      const agent = request.agents.find((candidate) => candidate.role === role);
      if (agent) {
        selected.push(agent.agentId);
      } else {
        missingRoles.push(role);
      }
    }

    for (const agent of request.agents) {
      const { agentId } = agent;
      if (selected.includes(agentId)) continue;
      skipReasons[agentId] = wanted.has(agent.role)
        ? `query does not need the ${agent.role} agent`
        : `no keyword route for role "${agent.role}"`;
    }

    let rationale = `mode=${intent.executionMode} urgency=${intent.urgency}`;
    if (missingRoles.length > 0) {
      rationale += ` missing=${missingRoles.join(',')}`;
    }

    return decisionFromSelection(selected, rationale, skipReasons);
  }
}

const PlannerOutputSchema = z.object({
  selected_agents: z.array(z.string()),
  rationale: z.string().default(''),
  skip_reasons: z.record(z.string()).default({}),
  answer: z.string().optional(),
});

/** An agent as the model sees it; `descriptor` is absent when it could not be resolved. */
export interface RoutingCandidate {
  agentId: string;
  role: string;
  descriptor?: AgentDescriptor;
}

function describeCandidate(candidate: RoutingCandidate, index: number): string {
  const { descriptor } = candidate;
  const heading = `${index + 1}. ${descriptor?.displayName ?? candidate.agentId}\n   ID: ${candidate.agentId}\n   Role: ${candidate.role}`;
  if (!descriptor) {
    return `${heading}\n   Skills:\n     - unknown (descriptor unavailable)`;
  }
  const skills = descriptor.skills
    .map((skill) => `     - ${skill.skillId}: ${skill.description} (e.g. ${skill.examples.slice(0, 3).join(' | ') || 'n/a'})`)
    .join('\n');
  return `${heading}\n   Skills:\n${skills || '     - none declared'}`;
}

export function buildRoutingPrompt(query: string, candidates: RoutingCandidate[]): string {
  const agents = candidates.map(describeCandidate).join('\n');

  return `
Decide which specialist agents should handle the customer request, and in what order.
Agents run one after another; each sees what the previous ones produced.

CUSTOMER REQUEST:
"${query}"

AVAILABLE AGENTS:
${agents}

Rules:
- Only use agent IDs from the list above.
- Put agents that fetch data before agents that act on it.
- If no agent is needed (greetings, unclear requests), select none and write a short answer asking for what you need.

Return ONLY JSON:
{
  "selected_agents": ["agent-id"],
  "rationale": "one sentence",
  "skip_reasons": { "agent-id": "why it is not needed" },
  "answer": "only when selected_agents is empty"
}
`;
}

/**
 * Lets a model pick the agents; anything it says is still checked by the router.
 * Agents whose descriptor cannot be resolved stay on the list without their skills.
 */
export class LlmRoutingPlanner implements RoutingPlanner {
  private readonly logger: Logger;

  constructor(private readonly llm: ChatCompleter, logger?: Logger) {
    this.logger = logger ?? createLogger('routing-planner');
  }

  async decide(request: RoutingRequest, signal?: AbortSignal): Promise<RoutingDecision> {
    const candidates = await Promise.all(
      request.agents.map(async (agent): Promise<RoutingCandidate> => {
        const base = { agentId: agent.agentId, role: agent.role };
        try {
          return { ...base, descriptor: await agent.describe(signal) };
        } catch (error) {
          this.logger.warn({ agentId: agent.agentId, err: error }, 'agent left undescribed in routing prompt');
          return base;
        }
      })
    );

    const result = await this.llm.complete(
      [
        {
          role: 'system',
          content: 'You are a request router for a customer-support system. Return ONLY valid JSON.',
        },
        { role: 'user', content: buildRoutingPrompt(request.query, candidates) },
      ],
      signal
    );

    let raw: unknown;
    try {
      raw = JSON.parse(sanitizeModelJSON(result.content));
    } catch {
      throw new InvalidRoutingDecisionError([], 'Routing planner returned a decision that is not JSON');
    }

    const parsed = PlannerOutputSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidRoutingDecisionError(
        [],
        `Routing planner returned a malformed decision: ${describeIssues(parsed.error).join('; ')}`
      );
    }

    const { selected_agents, rationale, skip_reasons, answer } = parsed.data;
    return decisionFromSelection(selected_agents, rationale, skip_reasons, answer);
  }
}
