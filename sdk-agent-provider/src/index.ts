export * from './types.js';
export { AgentProvider, type AgentProviderOptions } from './agent-provider.js';
export { AgentRuntime, DEFAULT_MAX_TOOL_ROUNDS, formatRequest, type AgentRuntimeOptions } from './agent-runtime.js';
export { HttpOperationBackend, type HttpOperationBackendOptions, type OperationBackend } from './backend-client.js';
export { ToolBroker, type ToolBrokerOptions } from './tool-broker.js';
export {
  LlmReasoningUnit,
  buildSystemPrompt,
  describeOperations,
  type ConversationMessage,
  type ReasoningContext,
  type ReasoningStep,
  type ReasoningUnit,
} from './reasoning-unit.js';
export { AGENT_DEFINITIONS, CUSTOMER_DATA_AGENT, SUPPORT_AGENT } from './agents.js';
export { loadAgentConfig, type AgentServiceConfig } from './config.js';
export { launchAgent } from './launch.js';
