import { z } from 'zod';
import { sanitizeModelJSON, type ChatCompleter, type LLMMessage } from '@support-mesh/agent-consumer';
import type { OperationDefinition } from './types.js';

export type ReasoningStep =
  | { type: 'tool_call'; operation: string; args: Record<string, unknown> }
  | { type: 'final'; answer: string };

export type ConversationMessage =
  | { role: 'user' | 'assistant'; content: string }
  | { role: 'tool'; operation: string; content: string };

export interface ReasoningContext {
  instruction: string;
  operations: OperationDefinition[];
  messages: ConversationMessage[];
}

/** Decides an agent's next step: call one operation, or answer. */
export interface ReasoningUnit {
  next(context: ReasoningContext, signal?: AbortSignal): Promise<ReasoningStep>;
}

const StepSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('call'),
    operation: z.string().min(1),
    args: z.record(z.unknown()).default({}),
  }),
  z.object({
    action: z.literal('final'),
    answer: z.string(),
  }),
]);

export function describeOperations(operations: OperationDefinition[]): string {
  return operations
    .map((operation) => {
      const params = Object.entries(operation.parameters)
        .map(([name, parameter]) => {
          const values = parameter.enum ? ` one of ${parameter.enum.join('|')}` : '';
          return `${name}${parameter.required ? '' : '?'}: ${parameter.type}${values}`;
        })
        .join(', ');
      const tag = operation.mutates ? ' [changes data]' : '';
      return `- ${operation.name}(${params}) -> ${operation.returns}${tag}: ${operation.description}`;
    })
    .join('\n');
}

export function buildSystemPrompt(context: ReasoningContext): string {
  return `${context.instruction.trim()}

AVAILABLE OPERATIONS:
${describeOperations(context.operations)}

Reply with exactly one JSON object and nothing else:
{"action": "call", "operation": "<name>", "args": {...}}  to use an operation, or
{"action": "final", "answer": "<reply>"}  when you can answer.`;
}

function toLLMMessage(message: ConversationMessage): LLMMessage {
  if (message.role === 'tool') {
    return { role: 'user', content: `RESULT OF ${message.operation}:\n${message.content}` };
  }
  return { role: message.role, content: message.content };
}

/** Model-backed reasoning: the model answers in a small JSON protocol; plain prose counts as the answer. */
export class LlmReasoningUnit implements ReasoningUnit {
  constructor(private readonly llm: ChatCompleter) {}

  async next(context: ReasoningContext, signal?: AbortSignal): Promise<ReasoningStep> {
    const response = await this.llm.complete(
      [{ role: 'system', content: buildSystemPrompt(context) }, ...context.messages.map(toLLMMessage)],
      signal
    );

    const content = sanitizeModelJSON(response.content);
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      return { type: 'final', answer: response.content.trim() };
    }

    const parsed = StepSchema.safeParse(raw);
    if (!parsed.success) {
      return { type: 'final', answer: response.content.trim() };
    }
    if (parsed.data.action === 'call') {
      return { type: 'tool_call', operation: parsed.data.operation, args: parsed.data.args };
    }
    return { type: 'final', answer: parsed.data.answer };
  }
}
