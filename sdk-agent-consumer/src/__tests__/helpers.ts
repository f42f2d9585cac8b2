import { vi } from 'vitest';
import { KnownAgents } from '../discovery/agent-registry.js';
import { silentLogger } from '../logger.js';
import type { SynthesisInput, Synthesizer } from '../reasoning/synthesizer.js';
import type { RunContext } from '../routers/router.js';
import type { AgentDescriptor, AgentHandle, InvocationRequest, InvocationResponse } from '../types.js';

export const logger = silentLogger;

export function descriptor(agentId: string, overrides: Partial<AgentDescriptor> = {}): AgentDescriptor {
  return {
    agentId,
    endpoint: `http://agents.test/${agentId}`,
    displayName: agentId,
    skills: [],
    ...overrides,
  };
}

type Behaviour = (request: InvocationRequest, signal?: AbortSignal) => Promise<InvocationResponse>;

/** In-process agent that records every request it receives. */
export class FakeAgent implements AgentHandle {
  readonly requests: InvocationRequest[] = [];
  /** Signals received by `invoke`, in call order. */
  readonly signals: (AbortSignal | undefined)[] = [];

  constructor(
    readonly agentId: string,
    readonly role: string,
    private readonly behaviour: Behaviour,
    readonly timeoutMs = 1000
  ) {}

  async describe(): Promise<AgentDescriptor> {
    return descriptor(this.agentId);
  }

  invoke(request: InvocationRequest, signal?: AbortSignal): Promise<InvocationResponse> {
    this.requests.push(structuredClone(request));
    this.signals.push(signal);
    return this.behaviour(request, signal);
  }
}

export function answering(answer: string): Behaviour {
  return async () => ({ answer, toolCalls: [], final: true });
}

export function failingWith(error: Error): Behaviour {
  return async () => {
    throw error;
  };
}

/** Answers after `ms`, or rejects with the abort reason if cancelled first. */
export function answeringAfter(ms: number, answer: string): Behaviour {
  return (_request, signal) =>
    new Promise((resolve, reject) => {
      const timer = setTimeout(() => resolve({ answer, toolCalls: [], final: true }), ms);
      signal?.addEventListener(
        'abort',
        () => {
          clearTimeout(timer);
          reject(signal.reason);
        },
        { once: true }
      );
    });
}

export function known(...agents: AgentHandle[]): KnownAgents {
  return new KnownAgents(agents);
}

export function runContext(query: string): RunContext {
  return {
    query,
    state: { turns: [{ role: 'user', content: query, timestamp: '2026-01-01T00:00:00.000Z' }], scratch: {} },
  };
}

export class RecordingSynthesizer implements Synthesizer {
  readonly inputs: SynthesisInput[] = [];

  async synthesize(input: SynthesisInput): Promise<string> {
    this.inputs.push(input);
    return input.entries.map((entry) => `${entry.agentId}=${entry.content}`).join(' | ');
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function fakeFetch(handler: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  return vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> =>
    handler(input instanceof Request ? input.url : input.toString(), init)
  );
}

/** What fetch rejects with when a connection attempt fails with `code`. */
export function networkFailure(code: string): TypeError {
  return new TypeError('fetch failed', { cause: Object.assign(new Error(`connect ${code}`), { code }) });
}
