import Fastify, { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { httpStatusFor } from './errors.js';
import type { Orchestrator } from './orchestrator.js';
import { AGENT_CARD_WELL_KNOWN_PATH, TurnSchema, describeIssues } from './protocol.js';
import type { AgentDescriptor } from './types.js';

const QueryBodySchema = z.object({
  query: z.string().trim().min(1),
  history: z.array(TurnSchema).default([]),
});

export interface HostServerOptions {
  descriptor: AgentDescriptor;
  port: number;
  host?: string;
  logLevel?: string;
}

/** HTTP face of the orchestrator: customers post queries here. */
export class HostServer {
  private server?: FastifyInstance;

  constructor(private readonly orchestrator: Orchestrator, private readonly options: HostServerOptions) {}

  build(): FastifyInstance {
    const logLevel = this.options.logLevel ?? 'info';
    const app = Fastify({ logger: logLevel === 'silent' ? false : { level: logLevel } });

    app.get(AGENT_CARD_WELL_KNOWN_PATH, async () => this.options.descriptor);

    app.get('/health', async () => ({
      status: 'ok',
      agentId: this.options.descriptor.agentId,
      mode: this.orchestrator.mode,
    }));

    app.post('/query', async (request, reply) => {
      const parsed = QueryBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.code(400).send({
          ok: false,
          error: { kind: 'ValidationError', message: describeIssues(parsed.error).join('; '), agents: [] },
        });
      }

      const result = await this.orchestrator.handle(parsed.data.query, parsed.data.history);
      if (!result.ok) {
        return reply.code(httpStatusFor(result.error.kind)).send(result);
      }
      return reply.code(200).send(result);
    });

    return app;
  }

  async start(): Promise<void> {
    this.server = this.build();
    await this.server.listen({ port: this.options.port, host: this.options.host ?? '0.0.0.0' });
  }

  async stop(): Promise<void> {
    if (this.server) {
      await this.server.close();
    }
  }
}
