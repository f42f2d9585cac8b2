export type ErrorKind =
  | 'DiscoveryError'
  | 'NotFound'
  | 'Unauthorized'
  | 'ValidationError'
  | 'BackendError'
  | 'Timeout'
  | 'Unreachable'
  | 'RemoteError'
  | 'StageFailure'
  | 'InvalidRoutingDecision'
  | 'BudgetExceeded'
  | 'AllAgentsFailed'
  | 'RunTimeout'
  | 'InvalidConfiguration';

export interface ErrorPayload {
  kind: string;
  message: string;
  [detail: string]: unknown;
}

/**
 * Base class for every failure the orchestration layer reports.
 * `kind` is the stable discriminant surfaced to callers; the message is for humans.
 */
export abstract class OrchestrationError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Agents implicated by this failure, for front-door reporting. */
  get agents(): string[] {
    return [];
  }

  toPayload(): ErrorPayload {
    return { kind: this.kind, message: this.message };
  }
}

export class DiscoveryError extends OrchestrationError {
  readonly kind = 'DiscoveryError' as const;
  /** The registered agent whose descriptor could not be resolved, when known. */
  readonly agentId?: string;

  constructor(
    public readonly url: string,
    message: string,
    options?: { cause?: unknown; agentId?: string }
  ) {
    super(message, options);
    this.agentId = options?.agentId;
  }

  get agents(): string[] {
    return this.agentId ? [this.agentId] : [];
  }

  toPayload(): ErrorPayload {
    return { ...super.toPayload(), url: this.url };
  }
}

export class NotFoundError extends OrchestrationError {
  readonly kind = 'NotFound' as const;

  constructor(
    public readonly reference: string,
    message = `Agent not found: ${reference}`,
    public readonly agentId?: string
  ) {
    super(message);
  }

  get agents(): string[] {
    return this.agentId ? [this.agentId] : [];
  }
}

export class UnauthorizedError extends OrchestrationError {
  readonly kind = 'Unauthorized' as const;

  constructor(public readonly agentName: string, public readonly operation: string) {
    super(`Agent "${agentName}" is not allowed to invoke operation "${operation}"`);
  }

  toPayload(): ErrorPayload {
    return { ...super.toPayload(), agent: this.agentName, operation: this.operation };
  }
}

export class ValidationError extends OrchestrationError {
  readonly kind = 'ValidationError' as const;

  constructor(public readonly operation: string, public readonly issues: string[]) {
    super(`Invalid arguments for "${operation}": ${issues.join('; ')}`);
  }

  toPayload(): ErrorPayload {
    return { ...super.toPayload(), operation: this.operation, issues: this.issues };
  }
}

export class BackendError extends OrchestrationError {
  readonly kind = 'BackendError' as const;

  constructor(
    public readonly operation: string,
    message: string,
    public readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  toPayload(): ErrorPayload {
    return { ...super.toPayload(), operation: this.operation };
  }
}

export class TimeoutError extends OrchestrationError {
  readonly kind = 'Timeout' as const;

  constructor(public readonly agentId: string, public readonly timeoutMs: number) {
    super(`Agent "${agentId}" did not answer within ${timeoutMs}ms`);
  }

  get agents(): string[] {
    return [this.agentId];
  }
}

export class UnreachableError extends OrchestrationError {
  readonly kind = 'Unreachable' as const;

  /** True only when the request never reached the agent, so sending it again is safe. */
  readonly retryable: boolean;

  constructor(
    public readonly agentId: string,
    public readonly endpoint: string,
    options?: { cause?: unknown; retryable?: boolean }
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Agent "${agentId}" is unreachable at ${endpoint}${reason}`, options);
    this.retryable = options?.retryable ?? false;
  }

  get agents(): string[] {
    return [this.agentId];
  }
}

export class RemoteError extends OrchestrationError {
  readonly kind = 'RemoteError' as const;

  /** `payload` is the remote agent's error object, passed through untouched. */
  constructor(public readonly agentId: string, public readonly payload: Record<string, unknown>) {
    const remoteMessage = typeof payload['message'] === 'string' ? payload['message'] : JSON.stringify(payload);
    super(`Agent "${agentId}" returned an error: ${remoteMessage}`);
  }

  get agents(): string[] {
    return [this.agentId];
  }

  toPayload(): ErrorPayload {
    return { ...super.toPayload(), remote: this.payload };
  }
}

export class StageFailureError extends OrchestrationError {
  readonly kind = 'StageFailure' as const;

  constructor(public readonly agentId: string, public readonly cause: OrchestrationError) {
    super(`Stage "${agentId}" failed: ${cause.message}`, { cause });
  }

  get agents(): string[] {
    return [this.agentId];
  }

  toPayload(): ErrorPayload {
    return { ...super.toPayload(), agentId: this.agentId, cause: this.cause.toPayload() };
  }
}

export class InvalidRoutingDecisionError extends OrchestrationError {
  readonly kind = 'InvalidRoutingDecision' as const;

  constructor(public readonly unknownAgents: string[], message?: string) {
    super(message ?? `Routing decision named unknown agents: ${unknownAgents.join(', ')}`);
  }

  get agents(): string[] {
    return this.unknownAgents;
  }
}

export class BudgetExceededError extends OrchestrationError {
  readonly kind = 'BudgetExceeded' as const;

  constructor(public readonly budget: number, public readonly requested: number, subject = 'agent invocations') {
    super(`Requested ${requested} ${subject}, budget is ${budget}`);
  }
}

export class AllAgentsFailedError extends OrchestrationError {
  readonly kind = 'AllAgentsFailed' as const;

  constructor(public readonly causes: Record<string, OrchestrationError>) {
    super(`All agents failed: ${Object.keys(causes).join(', ')}`);
  }

  get agents(): string[] {
    return Object.keys(this.causes);
  }

  toPayload(): ErrorPayload {
    const causes: Record<string, ErrorPayload> = {};
    for (const [agentId, cause] of Object.entries(this.causes)) {
      causes[agentId] = cause.toPayload();
    }
    return { ...super.toPayload(), causes };
  }
}

export class RunTimeoutError extends OrchestrationError {
  readonly kind = 'RunTimeout' as const;

  constructor(public readonly timeoutMs: number, public readonly pendingAgents: string[] = []) {
    super(`Run exceeded its ${timeoutMs}ms deadline`);
  }

  get agents(): string[] {
    return this.pendingAgents;
  }
}

export class InvalidConfigurationError extends OrchestrationError {
  readonly kind = 'InvalidConfiguration' as const;

  constructor(message: string, public readonly keys: string[] = []) {
    super(message);
  }

  toPayload(): ErrorPayload {
    return { ...super.toPayload(), keys: this.keys };
  }
}

export function isOrchestrationError(error: unknown): error is OrchestrationError {
  return error instanceof OrchestrationError;
}

export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof OrchestrationError) {
    return error.toPayload();
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'Internal', message };
}

const HTTP_STATUS: Record<string, number> = {
  DiscoveryError: 502,
  NotFound: 404,
  Unauthorized: 403,
  ValidationError: 400,
  BackendError: 502,
  Timeout: 504,
  Unreachable: 502,
  RemoteError: 502,
  StageFailure: 502,
  InvalidRoutingDecision: 422,
  BudgetExceeded: 422,
  AllAgentsFailed: 502,
  RunTimeout: 504,
  InvalidConfiguration: 500,
};

export function httpStatusFor(kind: string): number {
  return HTTP_STATUS[kind] ?? 500;
}
