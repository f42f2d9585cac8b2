import { Readable } from 'node:stream';
import Fastify, { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import jwt from 'jsonwebtoken';
import {
  AGENT_CARD_WELL_KNOWN_PATH,
  INVOKE_PATH,
  INVOKE_STREAM_PATH,
  InvocationRequestSchema,
  NDJSON_CONTENT_TYPE,
  describeIssues,
  httpStatusFor,
  toErrorPayload,
  type AgentDescriptor,
  type InvocationRequest,
  type ResponseChunk,
} from '@support-mesh/agent-consumer';
import type { AgentRuntime } from './agent-runtime.js';

export interface AgentProviderOptions {
  descriptor: AgentDescriptor;
  runtime: AgentRuntime;
  port: number;
  host?: string;
  /** When set, invoke routes require a bearer token signed with it. */
  jwtSecret?: string;
  rateLimit?: { max: number; timeWindow: string };
  logLevel?: string;
}

function errorBody(error: unknown) {
  return { error: toErrorPayload(error) };
}

/** Serves one agent: its descriptor, and blocking and streamed invocation. */
export class AgentProvider {
  private server?: FastifyInstance;

  constructor(private readonly options: AgentProviderOptions) {}

  get descriptor(): AgentDescriptor {
    return this.options.descriptor;
  }

  async build(): Promise<FastifyInstance> {
    const logLevel = this.options.logLevel ?? 'info';
    const app = Fastify({ logger: logLevel === 'silent' ? false : { level: logLevel } });
    const limits = this.options.rateLimit ?? { max: 120, timeWindow: '1 minute' };
    await app.register(rateLimit, { max: limits.max, timeWindow: limits.timeWindow });

    app.get(AGENT_CARD_WELL_KNOWN_PATH, async () => this.options.descriptor);

    app.get('/health', async () => ({ status: 'ok', agentId: this.options.descriptor.agentId }));

    app.post(INVOKE_PATH, async (request, reply) => {
      const invocation = this.authorize(request, reply);
      if (!invocation) return reply;

      try {
        const response = await this.options.runtime.invoke(invocation);
        return reply.code(200).send(response);
      } catch (error) {
        request.log.warn({ err: error }, 'invocation failed');
        return reply.code(httpStatusFor(toErrorPayload(error).kind)).send(errorBody(error));
      }
    });

    app.post(INVOKE_STREAM_PATH, async (request, reply) => {
      const invocation = this.authorize(request, reply);
      if (!invocation) return reply;

      const chunks = this.options.runtime.run(invocation);

      // Errors before the first chunk still get a proper status code.
      let first: IteratorResult<ResponseChunk>;
      try {
        first = await chunks.next();
      } catch (error) {
        request.log.warn({ err: error }, 'invocation failed');
        return reply.code(httpStatusFor(toErrorPayload(error).kind)).send(errorBody(error));
      }

      const lines = async function* (): AsyncGenerator<string> {
        if (first.done) return;
        yield `${JSON.stringify(first.value)}\n`;
        try {
          for await (const chunk of chunks) {
            yield `${JSON.stringify(chunk)}\n`;
          }
        } catch (error) {
          request.log.warn({ err: error }, 'invocation failed mid-stream');
          yield `${JSON.stringify(errorBody(error))}\n`;
        }
      };

      return reply.code(200).header('content-type', NDJSON_CONTENT_TYPE).send(Readable.from(lines()));
    });

    return app;
  }

  async start(): Promise<void> {
    this.server = await this.build();
    await this.server.listen({ port: this.options.port, host: this.options.host ?? '0.0.0.0' });
  }

  async stop(): Promise<void> {
    if (this.server) {
      await this.server.close();
    }
  }

  /** Checks the execution token and the request body; sends the error reply itself on failure. */
  private authorize(request: FastifyRequest, reply: FastifyReply): InvocationRequest | undefined {
    const { jwtSecret, descriptor } = this.options;

    if (jwtSecret) {
      const header = request.headers['authorization'];
      const token = typeof header === 'string' && header.startsWith('Bearer ') ? header.substring(7) : null;
      if (!token) {
        reply.code(401).send({ error: { kind: 'Unauthorized', message: 'Execution token required' } });
        return undefined;
      }

      try {
        const payload = jwt.verify(token, jwtSecret);
        if (typeof payload === 'string' || payload['agent_id'] !== descriptor.agentId) {
          reply.code(403).send({ error: { kind: 'Unauthorized', message: 'Token not valid for this agent' } });
          return undefined;
        }
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        reply.code(403).send({ error: { kind: 'Unauthorized', message: `Invalid execution token: ${reason}` } });
        return undefined;
      }
    }

    const parsed = InvocationRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400).send({
        error: { kind: 'ValidationError', message: describeIssues(parsed.error).join('; ') },
      });
      return undefined;
    }
    return parsed.data;
  }
}
