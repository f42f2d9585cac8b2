import {
  BudgetExceededError,
  accumulate,
  createLogger,
  type InvocationRequest,
  type InvocationResponse,
  type Logger,
  type ResponseChunk,
  type ToolCallRecord,
} from '@support-mesh/agent-consumer';
import type { ConversationMessage, ReasoningUnit } from './reasoning-unit.js';
import type { ToolBroker } from './tool-broker.js';
import type { ToolBinding } from './types.js';

export const DEFAULT_MAX_TOOL_ROUNDS = 20;

export interface AgentRuntimeOptions {
  agentId: string;
  instruction: string;
  binding: ToolBinding;
  broker: ToolBroker;
  reasoning: ReasoningUnit;
  maxToolRounds?: number;
  logger?: Logger;
}

/** Renders the invocation request as the opening user message. */
export function formatRequest(request: InvocationRequest): string {
  let text = `REQUEST:\n${request.query}`;

  const history = request.history.filter((turn) => turn.role !== 'user' || turn.content !== request.query);
  if (history.length > 0) {
    text += `\n\nCONVERSATION SO FAR:\n${history.map((turn) => `${turn.role}: ${turn.content}`).join('\n')}`;
  }
  if (Object.keys(request.scratch).length > 0) {
    text += `\n\nRESULTS FROM EARLIER STAGES:\n${JSON.stringify(request.scratch, null, 2)}`;
  }
  return text;
}

/**
 * The agent's reasoning loop. Each tool call is yielded as a non-final chunk;
 * the answer arrives as the last, final chunk.
 */
export class AgentRuntime {
  readonly agentId: string;
  private readonly instruction: string;
  private readonly binding: ToolBinding;
  private readonly broker: ToolBroker;
  private readonly reasoning: ReasoningUnit;
  private readonly maxToolRounds: number;
  private readonly logger: Logger;

  constructor(options: AgentRuntimeOptions) {
    this.agentId = options.agentId;
    this.instruction = options.instruction;
    this.binding = options.binding;
    this.broker = options.broker;
    this.reasoning = options.reasoning;
    this.maxToolRounds = options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    this.logger = options.logger ?? createLogger(options.agentId);
  }

  async *run(request: InvocationRequest, signal?: AbortSignal): AsyncGenerator<ResponseChunk> {
    const operations = this.broker.operationsFor(this.binding);
    const messages: ConversationMessage[] = [{ role: 'user', content: formatRequest(request) }];
    let rounds = 0;

    for (;;) {
      const step = await this.reasoning.next({ instruction: this.instruction, operations, messages }, signal);

      if (step.type === 'final') {
        this.logger.info({ rounds }, 'answer ready');
        yield { answer: step.answer, toolCalls: [], final: true };
        return;
      }

      if (rounds >= this.maxToolRounds) {
        throw new BudgetExceededError(this.maxToolRounds, rounds + 1, 'tool rounds');
      }
      rounds++;

      this.logger.info({ operation: step.operation, round: rounds }, 'calling operation');
      const result = await this.broker.invoke(this.binding, step.operation, step.args, signal);
      const record: ToolCallRecord = { operation: step.operation, args: step.args, result };

      messages.push(
        { role: 'assistant', content: JSON.stringify({ action: 'call', operation: step.operation, args: step.args }) },
        { role: 'tool', operation: step.operation, content: JSON.stringify(result ?? null) }
      );
      yield { answer: '', toolCalls: [record], final: false };
    }
  }

  invoke(request: InvocationRequest, signal?: AbortSignal): Promise<InvocationResponse> {
    return accumulate(this.run(request, signal), this.agentId);
  }
}
