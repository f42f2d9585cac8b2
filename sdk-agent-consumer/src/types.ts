import type { ErrorPayload } from './errors.js';

export interface AgentSkill {
  skillId: string;
  description: string;
  examples: string[];
}

/** Published metadata of an agent, served at the well-known descriptor path. */
export interface AgentDescriptor {
  agentId: string;
  endpoint: string;
  displayName: string;
  skills: AgentSkill[];
}

/** Either a descriptor held in hand or the base URL it can be discovered from. */
export type DescriptorReference =
  | { type: 'inline'; descriptor: AgentDescriptor }
  | { type: 'url'; baseUrl: string };

export type TurnRole = 'user' | 'assistant' | 'agent' | 'tool';

export interface Turn {
  role: TurnRole;
  content: string;
  timestamp: string;
}

export type Scratch = Record<string, unknown>;

/** Run-scoped state: created per query, discarded after the answer is returned. */
export interface SharedState {
  turns: Turn[];
  scratch: Scratch;
}

export interface ToolCallRecord {
  operation: string;
  args: Record<string, unknown>;
  result: unknown;
}

export interface InvocationRequest {
  query: string;
  history: Turn[];
  scratch: Scratch;
}

/** One piece of a streamed answer; `final: false` means more chunks follow. */
export interface ResponseChunk {
  answer: string;
  toolCalls: ToolCallRecord[];
  final: boolean;
}

export interface InvocationResponse {
  answer: string;
  toolCalls: ToolCallRecord[];
  final: boolean;
}

export interface CallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** Uniform view of an agent; transport details live behind the proxy. */
export interface AgentHandle {
  /** Registered id; a resolved descriptor must carry the same one. */
  readonly agentId: string;
  /** Scratch key this agent's output is merged under, e.g. "data" or "support". */
  readonly role: string;
  readonly timeoutMs: number;
  /** Resolves the agent's descriptor on first use within a run. */
  describe(signal?: AbortSignal): Promise<AgentDescriptor>;
  invoke(request: InvocationRequest, signal?: AbortSignal): Promise<InvocationResponse>;
}

export type RouterMode = 'sequential' | 'dynamic' | 'parallel';

export interface StageRecord {
  agentId: string;
  role: string;
  status: 'success' | 'failed' | 'skipped';
  durationMs: number;
  toolCalls: ToolCallRecord[];
  error?: ErrorPayload;
  reason?: string;
}

export interface RouterResult {
  answer: string;
  scratch: Scratch;
  stages: StageRecord[];
  rationale?: string;
}

export interface OrchestrationSuccess {
  ok: true;
  mode: RouterMode;
  answer: string;
  scratch: Scratch;
  stages: StageRecord[];
  rationale?: string;
  durationMs: number;
}

export interface OrchestrationFailure {
  ok: false;
  mode: RouterMode;
  error: ErrorPayload & { agents: string[] };
  durationMs: number;
}

export type OrchestrationResult = OrchestrationSuccess | OrchestrationFailure;
