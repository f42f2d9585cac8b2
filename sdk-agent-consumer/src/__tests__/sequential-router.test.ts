import { describe, expect, it } from 'vitest';
import { InvalidConfigurationError, StageFailureError, TimeoutError } from '../errors.js';
import { SequentialRouter } from '../routers/sequential-router.js';
import { FakeAgent, answering, failingWith, known, logger, runContext } from './helpers.js';

describe('SequentialRouter', () => {
  it('should run agents in registry order and hand earlier output to later stages', async () => {
    const data = new FakeAgent('customer-data-agent', 'data', answering('Customer 5 is Ada, premium plan'));
    const support = new FakeAgent('support-agent', 'support', answering('Created ticket 12 for the billing issue'));
    const router = new SequentialRouter(known(data, support), { logger });
    const context = runContext('Check account 5 and create a ticket for billing issues');

    const result = await router.route(context);

    expect(result.answer).toBe('Created ticket 12 for the billing issue');
    expect(result.stages.map((stage) => [stage.agentId, stage.status])).toEqual([
      ['customer-data-agent', 'success'],
      ['support-agent', 'success'],
    ]);

    expect(data.requests[0].scratch).toEqual({});
    expect(support.requests[0].query).toBe('Check account 5 and create a ticket for billing issues');
    expect(support.requests[0].scratch).toEqual({
      data: { agentId: 'customer-data-agent', answer: 'Customer 5 is Ada, premium plan', toolCalls: [] },
    });
    expect(support.requests[0].history.map((turn) => turn.content)).toEqual([
      'Check account 5 and create a ticket for billing issues',
      '[customer-data-agent] Customer 5 is Ada, premium plan',
    ]);
    expect(Object.keys(result.scratch)).toEqual(['data', 'support']);
  });

  it('should give every later stage the output of all earlier ones', async () => {
    const data = new FakeAgent('customer-data-agent', 'data', answering('a'));
    const support = new FakeAgent('support-agent', 'support', answering('b'));
    const billing = new FakeAgent('billing-agent', 'billing', answering('c'));
    const router = new SequentialRouter(known(data, support, billing), { logger });

    await router.route(runContext('Refund order 7 for customer 5'));

    expect(Object.keys(support.requests[0].scratch)).toEqual(['data']);
    expect(billing.requests[0].scratch).toEqual({
      data: { agentId: 'customer-data-agent', answer: 'a', toolCalls: [] },
      support: { agentId: 'support-agent', answer: 'b', toolCalls: [] },
    });
  });

  it('should stop at the first failing stage and never call the rest', async () => {
    const cause = new TimeoutError('customer-data-agent', 1000);
    const data = new FakeAgent('customer-data-agent', 'data', failingWith(cause));
    const support = new FakeAgent('support-agent', 'support', answering('unused'));
    const router = new SequentialRouter(known(data, support), { logger });

    const error = await router.route(runContext('Get customer 5')).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StageFailureError);
    expect(error).toMatchObject({ agentId: 'customer-data-agent', cause });
    expect(support.requests).toHaveLength(0);
  });

  it('should wrap a foreign error from an agent as a remote error', async () => {
    const data = new FakeAgent('customer-data-agent', 'data', failingWith(new Error('socket hang up')));
    const router = new SequentialRouter(known(data), { logger });

    const error = await router.route(runContext('Get customer 5')).catch((err: unknown) => err);

    expect(error).toMatchObject({
      kind: 'StageFailure',
      cause: { kind: 'RemoteError', payload: { kind: 'Internal', message: 'socket hang up' } },
    });
  });

  it('should refuse an empty agent list', () => {
    expect(() => new SequentialRouter(known(), { logger })).toThrow(InvalidConfigurationError);
  });
});
