// Base class for analytics agents: capability lookup, action dispatch and
// mapping of business failures onto tagged results

import { ZodError } from 'zod';
import type {
  ActionResult, AgentCapability, AgentDependencies, AgentOutput, AgentType, AnalyticsAgent,
  CallerContext,
} from '../types/agents.js';
import type { PermissionLevel } from '../types/permissions.js';
import { isAnalyticsError, toActionError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export abstract class BaseAgent<A extends string> implements AnalyticsAgent<A> {
  abstract readonly agentType: AgentType;
  abstract readonly ceiling: PermissionLevel;
  protected readonly log: Logger;

  constructor(
    readonly agentId: string,
    protected readonly deps: AgentDependencies,
  ) {
    this.log = createLogger('agent', { agentId });
  }

  abstract listCapabilities(): readonly AgentCapability<A>[];

  resolveAction(name: string): A | undefined {
    return this.listCapabilities().find((c) => c.name === name)?.name;
  }

  async execute(
    action: A,
    parameters: Readonly<Record<string, unknown>>,
    caller: CallerContext,
  ): Promise<ActionResult> {
    const started = Date.now();
    try {
      const output = await this.perform(action, parameters, caller);
      this.log.debug({ requestId: caller.requestId, action, ms: Date.now() - started }, 'Action completed');
      return { status: 'success', payload: output.data, insights: output.insights };
    } catch (err) {
      if (err instanceof ZodError || (isAnalyticsError(err) && err.recoverable)) {
        const error = toActionError(err);
        this.log.warn({ requestId: caller.requestId, action, code: error.code }, error.message);
        return { status: 'error', error };
      }
      throw err;
    }
  }

  protected abstract perform(
    action: A,
    parameters: Readonly<Record<string, unknown>>,
    caller: CallerContext,
  ): Promise<AgentOutput>;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled action: ${String(value)}`);
}
