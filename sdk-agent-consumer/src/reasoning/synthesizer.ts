import type { ChatCompleter } from '../llm-service.js';
import type { Turn } from '../types.js';

export interface SynthesisEntry {
  agentId: string;
  role: string;
  displayName: string;
  status: 'success' | 'failed';
  /** The agent's answer, or "unavailable: <cause>" for a failed agent. */
  content: string;
}

export interface SynthesisInput {
  query: string;
  history: Turn[];
  entries: SynthesisEntry[];
}

/** Combines independently produced agent answers into one. */
export interface Synthesizer {
  synthesize(input: SynthesisInput, signal?: AbortSignal): Promise<string>;
}

const SYNTHESIS_SYSTEM_PROMPT =
  'You combine answers from several customer-support specialists into one reply for the customer. ' +
  'Be accurate and concise, keep every concrete fact (customer details, ticket ids, statuses), ' +
  'and say plainly when part of the information was unavailable.';

export function buildSynthesisPrompt(input: SynthesisInput): string {
  let prompt = `CUSTOMER REQUEST:\n"${input.query}"\n\n`;
  prompt += `SPECIALIST RESPONSES (${input.entries.length} total):\n\n`;

  input.entries.forEach((entry, index) => {
    prompt += `--- ${index + 1}. ${entry.displayName} (${entry.role}) ---\n`;
    prompt += `Status: ${entry.status === 'success' ? 'SUCCESS' : 'FAILED'}\n`;
    prompt += `${entry.content}\n\n`;
  });

  prompt += 'Write the final reply to the customer. Mention any unavailable specialist briefly.';
  return prompt;
}

export class LlmSynthesizer implements Synthesizer {
  constructor(private readonly llm: ChatCompleter) {}

  async synthesize(input: SynthesisInput, signal?: AbortSignal): Promise<string> {
    const result = await this.llm.complete(
      [
        { role: 'system', content: SYNTHESIS_SYSTEM_PROMPT },
        { role: 'user', content: buildSynthesisPrompt(input) },
      ],
      signal
    );
    return result.content.trim();
  }
}

/** Deterministic synthesis for deployments without a model: one section per agent. */
export class TemplateSynthesizer implements Synthesizer {
  async synthesize(input: SynthesisInput): Promise<string> {
    return input.entries.map((entry) => `${entry.displayName}: ${entry.content}`).join('\n\n');
  }
}
