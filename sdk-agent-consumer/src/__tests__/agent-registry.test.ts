import { describe, expect, it, vi } from 'vitest';
import { AgentRegistry, KnownAgents } from '../discovery/agent-registry.js';
import { DescriptorResolver } from '../discovery/descriptor-resolver.js';
import { DiscoveryError, InvalidConfigurationError, NotFoundError } from '../errors.js';
import { RemoteAgentProxy } from '../remote/remote-agent-proxy.js';
import { FakeAgent, answering, descriptor, fakeFetch, jsonResponse, logger } from './helpers.js';

describe('KnownAgents', () => {
  it('should keep registry order and look agents up by id and role', () => {
    const data = new FakeAgent('customer-data-agent', 'data', answering('data'));
    const support = new FakeAgent('support-agent', 'support', answering('support'));
    const agents = new KnownAgents([data, support]);

    expect(agents.list().map((handle) => handle.agentId)).toEqual(['customer-data-agent', 'support-agent']);
    expect(agents.get('support-agent')).toBe(support);
    expect(agents.byRole('data')).toBe(data);
    expect(agents.has('billing-agent')).toBe(false);
    expect(agents.size).toBe(2);
  });

  it('should raise NotFound for an unknown agent', () => {
    const agents = new KnownAgents([new FakeAgent('support-agent', 'support', answering('ok'))]);

    expect(() => agents.get('billing-agent')).toThrow(NotFoundError);
  });

  it('should reject duplicate agent ids', () => {
    const build = () =>
      new KnownAgents([
        new FakeAgent('support-agent', 'data', answering('a')),
        new FakeAgent('support-agent', 'support', answering('b')),
      ]);

    expect(build).toThrow(InvalidConfigurationError);
    expect(build).toThrow('Duplicate agentId "support-agent" in registry');
  });

  it('should reject duplicate roles', () => {
    const build = () =>
      new KnownAgents([
        new FakeAgent('customer-data-agent', 'data', answering('a')),
        new FakeAgent('support-agent', 'data', answering('b')),
      ]);

    expect(build).toThrow('Duplicate role "data" in registry');
  });
});

describe('AgentRegistry', () => {
  const proxy = new RemoteAgentProxy({ fetch: fakeFetch(() => jsonResponse({})), logger });

  it('should reject duplicate roles at construction', () => {
    const resolver = new DescriptorResolver({ fetch: fakeFetch(() => jsonResponse({})), logger });
    const build = () =>
      new AgentRegistry(
        [
          { agentId: 'a', role: 'data', reference: { type: 'inline', descriptor: descriptor('a') } },
          { agentId: 'b', role: 'data', reference: { type: 'inline', descriptor: descriptor('b') } },
        ],
        { resolver, proxy, defaultTimeoutMs: 1000, logger }
      );

    expect(build).toThrow(InvalidConfigurationError);
    expect(build).toThrow('Duplicate role "data" in registry');
  });

  it('should reject duplicate agent ids at construction', () => {
    const resolver = new DescriptorResolver({ fetch: fakeFetch(() => jsonResponse({})), logger });
    const build = () =>
      new AgentRegistry(
        [
          { agentId: 'a', role: 'data', reference: { type: 'inline', descriptor: descriptor('a') } },
          { agentId: 'a', role: 'support', reference: { type: 'inline', descriptor: descriptor('a') } },
        ],
        { resolver, proxy, defaultTimeoutMs: 1000, logger }
      );

    expect(build).toThrow('Duplicate agentId "a" in registry');
  });

  it('should hand out registrations in order with their roles and timeouts, without fetching', () => {
    const fetch = fakeFetch(() => jsonResponse({}));
    const resolver = new DescriptorResolver({ fetch, logger });
    const registry = new AgentRegistry(
      [
        {
          agentId: 'customer-data-agent',
          role: 'data',
          reference: { type: 'url', baseUrl: 'http://localhost:10020' },
          timeoutMs: 500,
        },
        { agentId: 'support-agent', role: 'support', reference: { type: 'url', baseUrl: 'http://localhost:10021' } },
      ],
      { resolver, proxy, defaultTimeoutMs: 30000, logger }
    );

    const agents = registry.forRun();

    expect(agents.list().map((handle) => [handle.agentId, handle.role, handle.timeoutMs])).toEqual([
      ['customer-data-agent', 'data', 500],
      ['support-agent', 'support', 30000],
    ]);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('should describe an agent once per run and afresh in the next run', async () => {
    let port = 10020;
    const fetch = fakeFetch(() =>
      jsonResponse({ agentId: 'customer-data-agent', endpoint: `http://localhost:${port++}` })
    );
    const resolver = new DescriptorResolver({ fetch, logger });
    const registry = new AgentRegistry(
      [{ agentId: 'customer-data-agent', role: 'data', reference: { type: 'url', baseUrl: 'http://localhost:10020' } }],
      { resolver, proxy, defaultTimeoutMs: 1000, logger }
    );

    const first = registry.forRun().get('customer-data-agent');
    const firstDescriptor = await first.describe();
    const again = await first.describe();
    const second = await registry.forRun().get('customer-data-agent').describe();

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(again).toBe(firstDescriptor);
    expect(firstDescriptor.endpoint).toBe('http://localhost:10020');
    expect(second.endpoint).toBe('http://localhost:10021');
  });

  it('should attribute a missing descriptor to its agent', async () => {
    const resolver = new DescriptorResolver({ fetch: fakeFetch(() => new Response('', { status: 404 })), logger });
    const registry = new AgentRegistry(
      [{ agentId: 'customer-data-agent', role: 'data', reference: { type: 'url', baseUrl: 'http://localhost:10020' } }],
      { resolver, proxy, defaultTimeoutMs: 1000, logger }
    );

    const error = await registry
      .forRun()
      .get('customer-data-agent')
      .describe()
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ agents: ['customer-data-agent'] });
  });

  it('should reject a descriptor that carries another agent id', async () => {
    const resolver = new DescriptorResolver({
      fetch: fakeFetch(() => jsonResponse({ agentId: 'billing-agent', endpoint: 'http://localhost:10021' })),
      logger,
    });
    const registry = new AgentRegistry(
      [{ agentId: 'support-agent', role: 'support', reference: { type: 'url', baseUrl: 'http://localhost:10021' } }],
      { resolver, proxy, defaultTimeoutMs: 1000, logger }
    );

    const error = await registry
      .forRun()
      .get('support-agent')
      .invoke({ query: 'hi', history: [], scratch: {} })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DiscoveryError);
    expect(error).toMatchObject({
      message: 'Descriptor at http://localhost:10021 belongs to "billing-agent", expected "support-agent"',
      agents: ['support-agent'],
    });
  });
});

describe('RemoteAgent', () => {
  it('should call through the proxy with its own timeout', async () => {
    const fetch = fakeFetch(() => jsonResponse({ answer: 'ok', final: true }));
    const resolver = new DescriptorResolver({ fetch, logger });
    const proxy = new RemoteAgentProxy({ fetch, logger });
    const call = vi.spyOn(proxy, 'call');
    const registry = new AgentRegistry(
      [
        {
          agentId: 'support-agent',
          role: 'support',
          reference: { type: 'inline', descriptor: descriptor('support-agent') },
          stream: false,
        },
      ],
      { resolver, proxy, defaultTimeoutMs: 750, logger }
    );

    const response = await registry.forRun().get('support-agent').invoke({ query: 'hi', history: [], scratch: {} });

    expect(response.answer).toBe('ok');
    expect(call).toHaveBeenCalledWith(
      descriptor('support-agent'),
      { query: 'hi', history: [], scratch: {} },
      { timeoutMs: 750, stream: false, signal: undefined }
    );
  });
});
