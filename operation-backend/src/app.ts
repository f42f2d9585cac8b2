import Fastify, { FastifyInstance } from 'fastify';
import type { Queryable } from './database/client.js';
import { CustomerRepository } from './repositories/customer.repository.js';
import { TicketRepository } from './repositories/ticket.repository.js';
import { routes } from './routes/index.js';
import { OperationService } from './services/operation.service.js';

export interface BuildAppOptions {
  logLevel?: string;
}

export function createOperationService(db: Queryable): OperationService {
  return new OperationService(new CustomerRepository(db), new TicketRepository(db));
}

export function buildApp(db: Queryable, options: BuildAppOptions = {}): FastifyInstance {
  const logLevel = options.logLevel ?? 'info';
  const fastify = Fastify({ logger: logLevel === 'silent' ? false : { level: logLevel } });
  fastify.register(routes(createOperationService(db)));
  return fastify;
}
