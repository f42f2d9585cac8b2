import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { InvalidArgumentsError, OperationFailedError, UnknownOperationError } from '../errors.js';
import type { OperationService } from '../services/operation.service.js';

const InvokeBodySchema = z.object({ args: z.record(z.unknown()).default({}) });

export function routes(service: OperationService) {
  return async function operationRoutes(fastify: FastifyInstance) {
    fastify.get('/health', async () => {
      return { status: 'ok', timestamp: new Date().toISOString() };
    });

    fastify.get('/operations', async () => {
      return { operations: service.catalog() };
    });

    fastify.post<{ Params: { name: string } }>('/operations/:name', async (request, reply) => {
      const { name } = request.params;
      const body = InvokeBodySchema.safeParse(request.body ?? {});
      if (!body.success) {
        return reply.code(400).send({ error: { kind: 'ValidationError', message: 'Body must be {"args": {...}}' } });
      }

      try {
        const result = await service.execute(name, body.data.args);
        request.log.info({ operation: name }, 'operation executed');
        return reply.code(200).send({ result });
      } catch (error) {
        if (error instanceof UnknownOperationError) {
          return reply.code(404).send({ error: { kind: error.kind, message: error.message } });
        }
        if (error instanceof InvalidArgumentsError) {
          return reply.code(400).send({ error: { kind: error.kind, message: error.message, issues: error.issues } });
        }
        if (error instanceof OperationFailedError) {
          return reply.code(400).send({ error: { kind: error.kind, message: error.message } });
        }
        request.log.error({ err: error, operation: name }, 'operation failed');
        return reply.code(500).send({ error: { kind: 'Internal', message: 'Operation failed unexpectedly' } });
      }
    });
  };
}
