import { z } from 'zod';
import type { AgentDescriptor } from './types.js';

export const AGENT_CARD_WELL_KNOWN_PATH = '/.well-known/agent-card.json';
export const INVOKE_PATH = '/invoke';
export const INVOKE_STREAM_PATH = '/invoke/stream';
export const NDJSON_CONTENT_TYPE = 'application/x-ndjson';

const AgentSkillSchema = z.object({
  skillId: z.string().min(1),
  description: z.string().default(''),
  examples: z.array(z.string()).default([]),
});

export const AgentDescriptorSchema = z
  .object({
    agentId: z.string().min(1),
    endpoint: z.string().url(),
    displayName: z.string().optional(),
    skills: z.array(AgentSkillSchema).default([]),
  })
  .transform(
    (doc): AgentDescriptor => ({
      agentId: doc.agentId,
      endpoint: doc.endpoint,
      displayName: doc.displayName ?? doc.agentId,
      skills: doc.skills,
    })
  );

export const TurnSchema = z.object({
  role: z.enum(['user', 'assistant', 'agent', 'tool']),
  content: z.string(),
  timestamp: z.string(),
});

export const InvocationRequestSchema = z.object({
  query: z.string().min(1),
  history: z.array(TurnSchema).default([]),
  scratch: z.record(z.unknown()).default({}),
});

const ToolCallRecordSchema = z.object({
  operation: z.string(),
  args: z.record(z.unknown()).default({}),
  result: z.unknown(),
});

export const ResponseChunkSchema = z.object({
  answer: z.string().default(''),
  toolCalls: z.array(ToolCallRecordSchema).default([]),
  final: z.boolean(),
});

export const ErrorEnvelopeSchema = z.object({
  error: z.object({ kind: z.string(), message: z.string() }).passthrough(),
});

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}${path}`;
}

/** Flattens zod issues into "path: message" strings. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
