import { vi } from 'vitest';
import { silentLogger } from '@support-mesh/agent-consumer';
import type { OperationBackend } from '../backend-client.js';
import type { ReasoningContext, ReasoningStep, ReasoningUnit } from '../reasoning-unit.js';
import type { OperationDefinition } from '../types.js';

export const logger = silentLogger;

const ticketStatuses = ['open', 'in_progress', 'resolved'];
const ticketPriorities = ['low', 'medium', 'high'];

export const CATALOG: OperationDefinition[] = [
  {
    name: 'get_customer',
    description: 'Retrieve a customer by id.',
    parameters: { customer_id: { type: 'integer', required: true } },
    returns: 'Customer | null',
    mutates: false,
  },
  {
    name: 'get_ticket',
    description: 'Retrieve a ticket by id.',
    parameters: { ticket_id: { type: 'integer', required: true } },
    returns: 'TicketWithCustomer | null',
    mutates: false,
  },
  {
    name: 'list_tickets',
    description: 'List tickets.',
    parameters: {
      status: { type: 'string', required: false, enum: ticketStatuses },
      customer_id: { type: 'integer', required: false },
    },
    returns: 'TicketWithCustomer[]',
    mutates: false,
  },
  {
    name: 'create_ticket',
    description: 'Open a ticket for an existing customer.',
    parameters: {
      customer_id: { type: 'integer', required: true },
      issue: { type: 'string', required: true },
      priority: { type: 'string', required: false, enum: ticketPriorities },
    },
    returns: 'TicketWithCustomer',
    mutates: true,
  },
  {
    name: 'delete_ticket',
    description: 'Delete a ticket.',
    parameters: { ticket_id: { type: 'integer', required: true } },
    returns: '{ deleted: boolean }',
    mutates: true,
  },
];

type Handler = (args: Record<string, unknown>) => unknown;

/** In-memory operation backend; every call is recorded in order. */
export class FakeBackend implements OperationBackend {
  readonly calls: { operation: string; args: Record<string, unknown> }[] = [];
  private readonly handlers = new Map<string, Handler>();

  constructor(private readonly catalog: OperationDefinition[] = CATALOG) {}

  on(operation: string, handler: Handler): this {
    this.handlers.set(operation, handler);
    return this;
  }

  async listOperations(): Promise<OperationDefinition[]> {
    return this.catalog;
  }

  async execute(operation: string, args: Record<string, unknown>): Promise<unknown> {
    this.calls.push({ operation, args });
    const handler = this.handlers.get(operation);
    return handler ? handler(args) : null;
  }
}

/** Reasoning that plays back fixed steps; the last one repeats once the script runs out. */
export class ScriptedReasoning implements ReasoningUnit {
  readonly contexts: ReasoningContext[] = [];
  private index = 0;

  constructor(private readonly steps: ReasoningStep[]) {}

  async next(context: ReasoningContext): Promise<ReasoningStep> {
    this.contexts.push(structuredClone(context));
    const step = this.steps[Math.min(this.index, this.steps.length - 1)];
    this.index++;
    return step;
  }
}

export function call(operation: string, args: Record<string, unknown> = {}): ReasoningStep {
  return { type: 'tool_call', operation, args };
}

export function answer(text: string): ReasoningStep {
  return { type: 'final', answer: text };
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
