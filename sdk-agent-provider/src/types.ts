import type { AgentSkill } from '@support-mesh/agent-consumer';

export type ParameterType = 'string' | 'integer' | 'number' | 'boolean';

export interface OperationParameter {
  type: ParameterType;
  required: boolean;
  description?: string;
  /** Allowed values for a string parameter. */
  enum?: string[];
}

/** One entry of the operation backend's catalog. */
export interface OperationDefinition {
  name: string;
  description: string;
  parameters: Record<string, OperationParameter>;
  returns: string;
  /** Destructive or admin operations; never retried automatically. */
  mutates: boolean;
}

/** The operations one agent may use. Only the tool broker creates these. */
export interface ToolBinding {
  readonly agentName: string;
  readonly allowedOperations: ReadonlySet<string>;
}

export interface AgentDefinition {
  agentId: string;
  displayName: string;
  /** Scratch key the orchestrator stores this agent's output under. */
  role: string;
  defaultPort: number;
  instruction: string;
  allowedOperations: string[];
  skills: AgentSkill[];
}
