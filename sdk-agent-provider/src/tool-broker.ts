import { z } from 'zod';
import {
  BackendError,
  InvalidConfigurationError,
  UnauthorizedError,
  ValidationError,
  callWithRetry,
  createLogger,
  describeIssues,
  type Logger,
} from '@support-mesh/agent-consumer';
import type { OperationBackend } from './backend-client.js';
import type { OperationDefinition, OperationParameter, ToolBinding } from './types.js';

export interface ToolBrokerOptions {
  /** Wait before the single retry of a non-mutating operation. */
  retryBackoffMs?: number;
  logger?: Logger;
}

function baseSchema(parameter: OperationParameter): z.ZodTypeAny {
  switch (parameter.type) {
    case 'string': {
      const allowed = parameter.enum;
      return allowed
        ? z.string().refine((value) => allowed.includes(value), {
            message: `Expected one of: ${allowed.join(', ')}`,
          })
        : z.string();
    }
    case 'integer':
      return z.number().int();
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
  }
}

function parameterSchema(parameter: OperationParameter): z.ZodTypeAny {
  const schema = baseSchema(parameter);
  return parameter.required ? schema : schema.optional();
}

function argumentsSchema(operation: OperationDefinition): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, parameter] of Object.entries(operation.parameters)) {
    shape[name] = parameterSchema(parameter);
  }
  return z.object(shape).strict();
}

/**
 * Authorization and dispatch between an agent's reasoning and the operation backend.
 *
 * The binding is checked before anything else, so an operation outside it never
 * reaches the backend. Backend failures of non-mutating operations get one retry;
 * mutating operations run at most once per call.
 */
export class ToolBroker {
  private readonly operations: Map<string, OperationDefinition>;
  private readonly schemas = new Map<string, z.ZodTypeAny>();
  private readonly retryBackoffMs: number;
  private readonly logger: Logger;

  constructor(catalog: readonly OperationDefinition[], private readonly backend: OperationBackend, options: ToolBrokerOptions = {}) {
    this.operations = new Map();
    for (const operation of catalog) {
      if (this.operations.has(operation.name)) {
        throw new InvalidConfigurationError(`Operation catalog lists "${operation.name}" more than once`, [operation.name]);
      }
      this.operations.set(operation.name, operation);
      this.schemas.set(operation.name, argumentsSchema(operation));
    }
    this.retryBackoffMs = options.retryBackoffMs ?? 200;
    this.logger = options.logger ?? createLogger('tool-broker');
  }

  /** Loads the catalog from the backend, so bindings are validated against what it actually serves. */
  static async connect(backend: OperationBackend, options: ToolBrokerOptions = {}): Promise<ToolBroker> {
    const catalog = await backend.listOperations();
    return new ToolBroker(catalog, backend, options);
  }

  catalog(): OperationDefinition[] {
    return [...this.operations.values()];
  }

  /** Fails fast when the binding names an operation the catalog does not have. */
  bind(agentName: string, allowedOperations: Iterable<string>): ToolBinding {
    const allowed = new Set(allowedOperations);
    const unknown = [...allowed].filter((name) => !this.operations.has(name));
    if (unknown.length > 0) {
      throw new InvalidConfigurationError(
        `Binding for "${agentName}" names operations missing from the catalog: ${unknown.join(', ')}`,
        unknown
      );
    }
    return Object.freeze({ agentName, allowedOperations: allowed });
  }

  /** Definitions of the operations a binding allows, in catalog order. */
  operationsFor(binding: ToolBinding): OperationDefinition[] {
    return this.catalog().filter((operation) => binding.allowedOperations.has(operation.name));
  }

  async invoke(
    binding: ToolBinding,
    operationName: string,
    args: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<unknown> {
    const operation = this.operations.get(operationName);
    if (!binding.allowedOperations.has(operationName) || !operation) {
      this.logger.warn({ agent: binding.agentName, operation: operationName }, 'operation outside binding rejected');
      throw new UnauthorizedError(binding.agentName, operationName);
    }

    const schema = this.schemas.get(operationName) ?? argumentsSchema(operation);
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      throw new ValidationError(operationName, describeIssues(parsed.error));
    }

    return callWithRetry(() => this.backend.execute(operationName, args, signal), {
      maxRetries: operation.mutates ? 0 : 1,
      backoffMs: this.retryBackoffMs,
      signal,
      isRetryable: (error) => error instanceof BackendError && error.retryable,
      onRetry: (error) => {
        this.logger.warn({ agent: binding.agentName, operation: operationName, err: error }, 'backend call failed, retrying');
      },
    }).catch((error: unknown) => {
      if (error instanceof BackendError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new BackendError(operationName, message, false, { cause: error });
    });
  }
}
