import { LLMService, createLogger } from '@support-mesh/agent-consumer';
import { AgentProvider } from './agent-provider.js';
import { AgentRuntime } from './agent-runtime.js';
import { HttpOperationBackend } from './backend-client.js';
import { loadAgentConfig } from './config.js';
import { LlmReasoningUnit } from './reasoning-unit.js';
import { ToolBroker } from './tool-broker.js';
import type { AgentDefinition } from './types.js';

/** Wires one agent from its definition and the environment, and starts serving it. */
export async function launchAgent(definition: AgentDefinition, env: NodeJS.ProcessEnv = process.env): Promise<AgentProvider> {
  const config = loadAgentConfig(definition.defaultPort, env);
  const logger = createLogger(definition.agentId, config.logLevel);

  const broker = await ToolBroker.connect(new HttpOperationBackend(config.backendUrl), { logger });
  const binding = broker.bind(definition.agentId, definition.allowedOperations);

  const runtime = new AgentRuntime({
    agentId: definition.agentId,
    instruction: definition.instruction,
    binding,
    broker,
    reasoning: new LlmReasoningUnit(new LLMService(config.llm)),
    maxToolRounds: config.maxToolRounds,
    logger,
  });

  const provider = new AgentProvider({
    descriptor: {
      agentId: definition.agentId,
      endpoint: config.endpoint,
      displayName: definition.displayName,
      skills: definition.skills,
    },
    runtime,
    port: config.port,
    host: config.host,
    jwtSecret: config.jwtSecret,
    logLevel: config.logLevel,
  });

  await provider.start();
  logger.info({ endpoint: config.endpoint, operations: [...binding.allowedOperations] }, 'agent listening');
  return provider;
}
