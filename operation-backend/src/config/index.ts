import { z } from 'zod';

const BackendEnvSchema = z.object({
  DATABASE_HOST: z.string().default('localhost'),
  DATABASE_PORT: z.coerce.number().int().positive().default(5432),
  DATABASE_NAME: z.string().default('customer_support'),
  DATABASE_USER: z.string().default('postgres'),
  DATABASE_PASSWORD: z.string().default('postgres'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface BackendConfig {
  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
  };
  server: {
    port: number;
    host: string;
  };
  logLevel: string;
}

export function loadBackendConfig(env: NodeJS.ProcessEnv = process.env): BackendConfig {
  const parsed = BackendEnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid backend configuration: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  return {
    database: {
      host: values.DATABASE_HOST,
      port: values.DATABASE_PORT,
      database: values.DATABASE_NAME,
      user: values.DATABASE_USER,
      password: values.DATABASE_PASSWORD,
    },
    server: {
      port: values.PORT,
      host: values.HOST,
    },
    logLevel: values.LOG_LEVEL,
  };
}
