export * from './types.js';
export * from './errors.js';
export * from './protocol.js';
export { createLogger, silentLogger, type Logger } from './logger.js';
export { callWithRetry, type RetryOptions } from './retry.js';
export {
  LLMService,
  LLM_PROVIDERS,
  sanitizeModelJSON,
  type ChatCompleter,
  type LLMProvider,
  type LLMConfig,
  type LLMMessage,
  type LLMResponse,
} from './llm-service.js';
export {
  DescriptorResolver,
  type DescriptorResolverOptions,
  type ResolveOptions,
} from './discovery/descriptor-resolver.js';
export { AgentRegistry, KnownAgents, type AgentRegistration, type AgentRegistryOptions } from './discovery/agent-registry.js';
export {
  RemoteAgentProxy,
  accumulate,
  readChunks,
  type ProxyCallOptions,
  type RemoteAgentProxyOptions,
} from './remote/remote-agent-proxy.js';
export { RemoteAgent, type RemoteAgentOptions } from './remote/remote-agent.js';
export {
  EXECUTION_TOKEN_TTL_SECONDS,
  createExecutionTokenSigner,
  type ExecutionTokenPayload,
} from './remote/execution-token.js';
export type { Router, RunContext, StageOutput } from './routers/router.js';
export { SequentialRouter } from './routers/sequential-router.js';
export { DynamicRouter, type DynamicRouterOptions } from './routers/dynamic-router.js';
export { ParallelRouter, type AgentOutcome, type ParallelRouterOptions } from './routers/parallel-router.js';
export {
  DEFAULT_CLARIFICATION,
  decisionFromSelection,
  validateDecision,
  type PlannerAgentInfo,
  type RoutingDecision,
  type RoutingPlanner,
  type RoutingRequest,
} from './routers/routing-decision.js';
export {
  KeywordRoutingPlanner,
  LlmRoutingPlanner,
  analyzeQueryIntent,
  buildRoutingPrompt,
  type QueryIntent,
  type RoutingCandidate,
} from './reasoning/routing-planner.js';
export {
  LlmSynthesizer,
  TemplateSynthesizer,
  buildSynthesisPrompt,
  type SynthesisEntry,
  type SynthesisInput,
  type Synthesizer,
} from './reasoning/synthesizer.js';
export { Orchestrator, type AgentSource, type OrchestratorOptions } from './orchestrator.js';
export { ROUTER_MODES, loadConfig, parseRouterMode, type OrchestratorConfig } from './config.js';
export { HostServer, type HostServerOptions } from './host-server.js';
