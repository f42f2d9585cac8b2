import jwt from 'jsonwebtoken';
import type { AgentDescriptor } from '../types.js';

export const EXECUTION_TOKEN_TTL_SECONDS = 300;

export interface ExecutionTokenPayload {
  agent_id: string;
  caller: string;
}

/** Signs short-lived per-agent execution tokens that agent servers verify with the same secret. */
export function createExecutionTokenSigner(secret: string, caller = 'orchestrator') {
  return (descriptor: AgentDescriptor): string => {
    const payload: ExecutionTokenPayload = { agent_id: descriptor.agentId, caller };
    return jwt.sign(payload, secret, { expiresIn: EXECUTION_TOKEN_TTL_SECONDS });
  };
}
