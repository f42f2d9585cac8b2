import { OrchestrationError, RemoteError, StageFailureError, toErrorPayload } from '../errors.js';
import type { Logger } from '../logger.js';
import type {
  AgentHandle,
  InvocationRequest,
  InvocationResponse,
  RouterMode,
  RouterResult,
  SharedState,
  StageRecord,
} from '../types.js';

export interface RunContext {
  query: string;
  state: SharedState;
  /** Aborted by the front door when the run deadline passes. */
  signal?: AbortSignal;
}

export interface Router {
  readonly mode: RouterMode;
  route(context: RunContext): Promise<RouterResult>;
}

/** What an agent's stage leaves in scratch under its role key. */
export interface StageOutput {
  agentId: string;
  answer: string;
  toolCalls: InvocationResponse['toolCalls'];
}

/** The next agent sees the original query plus everything earlier stages produced. */
export function buildStageRequest(query: string, state: SharedState): InvocationRequest {
  return {
    query,
    history: state.turns.map((turn) => ({ ...turn })),
    scratch: { ...state.scratch },
  };
}

export function mergeOutput(state: SharedState, handle: AgentHandle, response: InvocationResponse): void {
  const output: StageOutput = {
    agentId: handle.agentId,
    answer: response.answer,
    toolCalls: response.toolCalls,
  };
  state.scratch[handle.role] = output;
  state.turns.push({
    role: 'agent',
    content: `[${handle.agentId}] ${response.answer}`,
    timestamp: new Date().toISOString(),
  });
}

/** Normalizes whatever an agent invocation threw into the taxonomy. */
export function asOrchestrationError(handle: AgentHandle, error: unknown): OrchestrationError {
  if (error instanceof OrchestrationError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new RemoteError(handle.agentId, { kind: 'Internal', message });
}

/** Re-raises the run-level abort reason so a cancelled run is not mistaken for a stage failure. */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw signal.reason;
  }
}

export function skippedStage(handle: AgentHandle, reason: string): StageRecord {
  return {
    agentId: handle.agentId,
    role: handle.role,
    status: 'skipped',
    durationMs: 0,
    toolCalls: [],
    reason,
  };
}

/**
 * Runs agents one at a time in the given order, merging each output into
 * scratch before the next request is built. The first terminal failure ends
 * the run with `StageFailure`; later stages are never called.
 */
export async function runPipeline(
  handles: readonly AgentHandle[],
  context: RunContext,
  logger: Logger
): Promise<RouterResult> {
  const stages: StageRecord[] = [];
  let answer = '';

  for (const handle of handles) {
    const { agentId } = handle;
    const request = buildStageRequest(context.query, context.state);
    const startedAt = Date.now();

    logger.info({ agentId, role: handle.role }, 'stage started');

    let response: InvocationResponse;
    try {
      response = await handle.invoke(request, context.signal);
    } catch (error) {
      throwIfCancelled(context.signal);
      const cause = asOrchestrationError(handle, error);
      logger.warn({ agentId, kind: cause.kind, err: cause }, 'stage failed');
      throw new StageFailureError(agentId, cause);
    }

    mergeOutput(context.state, handle, response);
    answer = response.answer;
    stages.push({
      agentId,
      role: handle.role,
      status: 'success',
      durationMs: Date.now() - startedAt,
      toolCalls: response.toolCalls,
    });
    logger.info({ agentId, durationMs: Date.now() - startedAt }, 'stage finished');
  }

  return { answer, scratch: context.state.scratch, stages };
}

export function failedStage(handle: AgentHandle, error: OrchestrationError, durationMs: number): StageRecord {
  return {
    agentId: handle.agentId,
    role: handle.role,
    status: 'failed',
    durationMs,
    toolCalls: [],
    error: toErrorPayload(error),
  };
}
