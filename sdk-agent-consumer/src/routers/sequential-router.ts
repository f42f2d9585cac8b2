import type { KnownAgents } from '../discovery/agent-registry.js';
import { InvalidConfigurationError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { RouterResult } from '../types.js';
import { runPipeline, type Router, type RunContext } from './router.js';

export interface SequentialRouterOptions {
  logger?: Logger;
}

/** Fixed pipeline over every known agent, in registry order. */
export class SequentialRouter implements Router {
  readonly mode = 'sequential' as const;
  private readonly logger: Logger;

  constructor(private readonly agents: KnownAgents, options: SequentialRouterOptions = {}) {
    if (agents.size === 0) {
      throw new InvalidConfigurationError('Sequential routing needs at least one agent');
    }
    this.logger = options.logger ?? createLogger('sequential-router');
  }

  route(context: RunContext): Promise<RouterResult> {
    return runPipeline(this.agents.list(), context, this.logger);
  }
}
