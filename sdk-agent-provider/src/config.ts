import { z } from 'zod';
import {
  InvalidConfigurationError,
  LLM_PROVIDERS,
  describeIssues,
  type LLMConfig,
} from '@support-mesh/agent-consumer';
import { DEFAULT_MAX_TOOL_ROUNDS } from './agent-runtime.js';

const AgentEnvSchema = z.object({
  OPERATION_BACKEND_URL: z.string().url().default('http://localhost:8080'),
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
  HOST: z.string().default('0.0.0.0'),
  PUBLIC_ENDPOINT: z.string().url().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MAX_TOOL_ROUNDS: z.coerce.number().int().positive().default(DEFAULT_MAX_TOOL_ROUNDS),
  LLM_PROVIDER: z.enum(LLM_PROVIDERS).default('openai'),
  LLM_API_KEY: z.string().min(1, 'LLM_API_KEY is required to run an agent'),
  LLM_MODEL: z.string().default('gpt-4o-mini'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  AGENT_JWT_SECRET: z.string().min(16).optional(),
});

export interface AgentServiceConfig {
  backendUrl: string;
  port: number;
  host: string;
  endpoint: string;
  logLevel: string;
  maxToolRounds: number;
  llm: LLMConfig;
  jwtSecret?: string;
}

export function loadAgentConfig(defaultPort: number, env: NodeJS.ProcessEnv = process.env): AgentServiceConfig {
  const parsed = AgentEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      `Invalid agent configuration: ${describeIssues(parsed.error).join('; ')}`,
      parsed.error.issues.map((issue) => issue.path.join('.'))
    );
  }

  const values = parsed.data;
  const port = values.PORT ?? defaultPort;
  return {
    backendUrl: values.OPERATION_BACKEND_URL,
    port,
    host: values.HOST,
    endpoint: values.PUBLIC_ENDPOINT ?? `http://localhost:${port}`,
    logLevel: values.LOG_LEVEL,
    maxToolRounds: values.MAX_TOOL_ROUNDS,
    llm: {
      provider: values.LLM_PROVIDER,
      apiKey: values.LLM_API_KEY,
      model: values.LLM_MODEL,
      temperature: values.LLM_TEMPERATURE,
    },
    jwtSecret: values.AGENT_JWT_SECRET,
  };
}
