import { z } from 'zod';
import type { AgentRegistration } from './discovery/agent-registry.js';
import { InvalidConfigurationError } from './errors.js';
import { LLM_PROVIDERS, type LLMConfig } from './llm-service.js';
import { describeIssues } from './protocol.js';
import type { RouterMode } from './types.js';

export const ROUTER_MODES: readonly RouterMode[] = ['sequential', 'dynamic', 'parallel'];

export function parseRouterMode(value: string): RouterMode {
  const mode = ROUTER_MODES.find((candidate) => candidate === value.trim().toLowerCase());
  if (!mode) {
    throw new InvalidConfigurationError(
      `Unknown router mode "${value}". Expected one of: ${ROUTER_MODES.join(', ')}`,
      ['ROUTER_MODE']
    );
  }
  return mode;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes' || value === 'on');

const OrchestratorEnvSchema = z.object({
  ROUTER_MODE: z.string().default('sequential'),
  ROUTING_PLANNER: z.enum(['keyword', 'llm']).default('keyword'),
  CUSTOMER_DATA_AGENT_URL: z.string().url().default('http://localhost:10020'),
  CUSTOMER_DATA_AGENT_ID: z.string().min(1).default('customer-data-agent'),
  SUPPORT_AGENT_URL: z.string().url().default('http://localhost:10021'),
  SUPPORT_AGENT_ID: z.string().min(1).default('support-agent'),
  AGENT_STREAMING: booleanFlag.default('false'),
  AGENT_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  AGENT_MAX_RETRIES: z.coerce.number().int().nonnegative().default(1),
  INVOCATION_BUDGET: z.coerce.number().int().positive().default(4),
  HOST: z.string().default('0.0.0.0'),
  HOST_AGENT_PORT: z.coerce.number().int().min(1).max(65535).default(10022),
  PUBLIC_ENDPOINT: z.string().url().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LLM_PROVIDER: z.enum(LLM_PROVIDERS).default('openai'),
  LLM_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().default('gpt-4o-mini'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  AGENT_JWT_SECRET: z.string().min(16).optional(),
});

export interface OrchestratorConfig {
  mode: RouterMode;
  planner: 'keyword' | 'llm';
  agents: AgentRegistration[];
  agentTimeoutMs: number;
  runTimeoutMs: number;
  maxRetries: number;
  invocationBudget: number;
  server: { host: string; port: number; publicEndpoint?: string };
  logLevel: string;
  llm?: LLMConfig;
  jwtSecret?: string;
}

/** Reads orchestrator settings from the environment; anything invalid fails fast. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): OrchestratorConfig {
  const parsed = OrchestratorEnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new InvalidConfigurationError(
      `Invalid orchestrator configuration: ${describeIssues(parsed.error).join('; ')}`,
      keys
    );
  }

  const values = parsed.data;
  const mode = parseRouterMode(values.ROUTER_MODE);
  const llm: LLMConfig | undefined = values.LLM_API_KEY
    ? {
        provider: values.LLM_PROVIDER,
        apiKey: values.LLM_API_KEY,
        model: values.LLM_MODEL,
        temperature: values.LLM_TEMPERATURE,
      }
    : undefined;

  if (values.ROUTING_PLANNER === 'llm' && !llm) {
    throw new InvalidConfigurationError('ROUTING_PLANNER=llm requires LLM_API_KEY', ['LLM_API_KEY']);
  }

  return {
    mode,
    planner: values.ROUTING_PLANNER,
    agents: [
      {
        agentId: values.CUSTOMER_DATA_AGENT_ID,
        role: 'data',
        reference: { type: 'url', baseUrl: values.CUSTOMER_DATA_AGENT_URL },
        stream: values.AGENT_STREAMING,
      },
      {
        agentId: values.SUPPORT_AGENT_ID,
        role: 'support',
        reference: { type: 'url', baseUrl: values.SUPPORT_AGENT_URL },
        stream: values.AGENT_STREAMING,
      },
    ],
    agentTimeoutMs: values.AGENT_TIMEOUT_MS,
    runTimeoutMs: values.RUN_TIMEOUT_MS,
    maxRetries: values.AGENT_MAX_RETRIES,
    invocationBudget: values.INVOCATION_BUDGET,
    server: {
      host: values.HOST,
      port: values.HOST_AGENT_PORT,
      publicEndpoint: values.PUBLIC_ENDPOINT,
    },
    logLevel: values.LOG_LEVEL,
    llm,
    jwtSecret: values.AGENT_JWT_SECRET,
  };
}
