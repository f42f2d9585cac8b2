import { afterEach, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import type { Queryable } from '../database/client.js';
import { ADA, fakeDb } from './fake-db.js';

let app: FastifyInstance | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

function serve(db: Queryable): FastifyInstance {
  app = buildApp(db, { logLevel: 'silent' });
  return app;
}

describe('operation routes', () => {
  it('should report health', async () => {
    const response = await serve(fakeDb().db).inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok' });
  });

  it('should serve the operation catalog', async () => {
    const response = await serve(fakeDb().db).inject({ method: 'GET', url: '/operations' });
    const body: { operations: { name: string; mutates: boolean }[] } = response.json();

    expect(body.operations.map((operation) => operation.name)).toEqual([
      'get_customer',
      'list_customers',
      'add_customer',
      'update_customer',
      'disable_customer',
      'activate_customer',
      'get_ticket',
      'list_tickets',
      'create_ticket',
      'update_ticket_status',
      'update_ticket_priority',
      'delete_ticket',
      'get_ticket_stats',
      'get_customer_stats',
      'search_tickets',
    ]);
    expect(body.operations.filter((operation) => operation.mutates)).toHaveLength(8);
  });

  it('should run an operation and wrap its result', async () => {
    const response = await serve(fakeDb(() => ({ rows: [ADA] })).db).inject({
      method: 'POST',
      url: '/operations/get_customer',
      payload: { args: { customer_id: 5 } },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ result: ADA });
  });

  it('should answer 404 for an unknown operation', async () => {
    const response = await serve(fakeDb().db).inject({
      method: 'POST',
      url: '/operations/refund_order',
      payload: { args: {} },
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: { kind: 'NotFound', message: 'Unknown operation: refund_order' } });
  });

  it('should answer 400 with the argument issues', async () => {
    const response = await serve(fakeDb().db).inject({
      method: 'POST',
      url: '/operations/list_tickets',
      payload: { args: { priority: 'urgent' } },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: {
        kind: 'ValidationError',
        message:
          'Invalid arguments for "list_tickets": priority: Invalid enum value. Expected \'low\' | \'medium\' | \'high\', received \'urgent\'',
        issues: ["priority: Invalid enum value. Expected 'low' | 'medium' | 'high', received 'urgent'"],
      },
    });
  });

  it('should answer 400 when the operation cannot be carried out', async () => {
    const response = await serve(fakeDb().db).inject({
      method: 'POST',
      url: '/operations/activate_customer',
      payload: { args: { customer_id: 42 } },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: { kind: 'OperationFailed', message: 'Customer with ID 42 not found' } });
  });

  it('should hide database failures behind a 500', async () => {
    const { db } = fakeDb(() => {
      throw new Error('connection terminated');
    });

    const response = await serve(db).inject({
      method: 'POST',
      url: '/operations/get_customer_stats',
      payload: { args: {} },
    });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: { kind: 'Internal', message: 'Operation failed unexpectedly' } });
  });
});
