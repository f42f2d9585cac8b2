import 'dotenv/config';
import {
  AgentRegistry,
  DescriptorResolver,
  HostServer,
  KeywordRoutingPlanner,
  LLMService,
  LlmRoutingPlanner,
  LlmSynthesizer,
  Orchestrator,
  RemoteAgentProxy,
  TemplateSynthesizer,
  createExecutionTokenSigner,
  createLogger,
  loadConfig,
} from './src/index.js';

/**
 * Host agent: receives customer queries and routes them to the
 * customer-data and support agents.
 */

const config = loadConfig();
const logger = createLogger('host-agent', config.logLevel);
const llm = config.llm ? new LLMService(config.llm) : undefined;

const registry = new AgentRegistry(config.agents, {
  resolver: new DescriptorResolver({ logger }),
  proxy: new RemoteAgentProxy({
    maxRetries: config.maxRetries,
    tokenFor: config.jwtSecret ? createExecutionTokenSigner(config.jwtSecret, 'host-agent') : undefined,
    logger,
  }),
  defaultTimeoutMs: config.agentTimeoutMs,
  logger,
});

const orchestrator = new Orchestrator({
  mode: config.mode,
  agents: registry,
  planner: config.planner === 'llm' && llm ? new LlmRoutingPlanner(llm, logger) : new KeywordRoutingPlanner(),
  synthesizer: llm ? new LlmSynthesizer(llm) : new TemplateSynthesizer(),
  invocationBudget: config.invocationBudget,
  runTimeoutMs: config.runTimeoutMs,
  logger,
});

const endpoint = config.server.publicEndpoint ?? `http://localhost:${config.server.port}`;

const server = new HostServer(orchestrator, {
  descriptor: {
    agentId: 'host-agent',
    endpoint,
    displayName: 'Customer Service Host',
    skills: [
      {
        skillId: 'customer_service',
        description: 'Answers customer questions by coordinating the customer-data and support agents',
        examples: [
          'Get customer information for ID 5',
          'I need help with my account, customer ID 12345',
          'Show me all active customers who have open tickets',
        ],
      },
    ],
  },
  port: config.server.port,
  host: config.server.host,
  logLevel: config.logLevel,
});

server.start().then(
  () => logger.info({ endpoint, mode: config.mode }, 'host agent listening'),
  (error: unknown) => {
    logger.error({ err: error }, 'host agent failed to start');
    process.exit(1);
  }
);

process.on('SIGINT', () => {
  server.stop().then(
    () => process.exit(0),
    () => process.exit(1)
  );
});
