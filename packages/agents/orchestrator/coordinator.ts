// Analytics Orchestrator: routes a request through role detection, agent
// selection and concurrent agent execution, then synthesizes one response

import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import { z } from 'zod';
import type { ActionResult, CallerContext } from '../types/agents.js';
import {
  QUERY_TYPES,
  type AnalyticsRequest, type AnalyticsResponse, type ContextSummary, type ProcessOptions, type QueryType,
  type RequestState,
} from '../types/analysis.js';
import type { AssembledContext, ContextSources, Role } from '../types/context.js';
import type { PermissionLevel } from '../types/permissions.js';
import { SimpleEventBus, type DomainEventType, type EventBus } from '../types/events.js';
import { ROUTING_TABLE, type RouteStep, type RoutingTable } from '../config/routing-table.js';
import type { AgentFactory } from './agent-factory.js';
import { buildContext, EMPTY_SOURCES } from './context-manager.js';
import { checkPermission, refusalError, ROLE_PERMISSIONS } from './permissions.js';
import { AtomicMetricsSink, type MetricsSink } from './metrics.js';
import { overallStatus, synthesizeInsights } from './synthesizer.js';
import { withTimeout } from '../utils/timeout.js';
import {
  AgentExecutionError, AgentNotFoundError, AgentTimeoutError, InvalidRequestError, InvalidTransitionError,
  errorMessage, formatZodError, toActionError,
} from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface OrchestratorConfig {
  factory: AgentFactory;
  routes?: RoutingTable;
  contextSources?: ContextSources;
  metrics?: MetricsSink;
  /** Per-agent-call deadline. Default: 5000 */
  agentTimeoutMs?: number;
  baseTokenBudget?: number;
  rolePermissions?: Readonly<Record<Role, PermissionLevel>>;
  eventBus?: EventBus;
  onEvent?: (event: { type: string; payload: unknown }) => void;
  logger?: Logger;
}

const TRANSITIONS: Readonly<Record<RequestState, readonly RequestState[]>> = {
  received: ['role_detected', 'failed'],
  role_detected: ['agents_selected', 'failed'],
  agents_selected: ['executing', 'failed'],
  executing: ['synthesizing', 'failed'],
  synthesizing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

const requestSchema = z.object({
  requestId: z.string().min(1).optional(),
  userId: z.string().min(1),
  query: z.string(),
  queryType: z.string().min(1),
  parameters: z.record(z.unknown()).default({}),
  contextHints: z.record(z.unknown()).default({}),
});

const queryTypeSchema = z.enum(QUERY_TYPES);

function summarizeContext(context: AssembledContext): ContextSummary {
  return {
    budgetTokens: context.budgetTokens,
    usedTokens: context.usedTokens,
    sections: context.sections.map((s) => ({ priority: s.priority, label: s.label })),
    dropped: { ...context.dropped },
  };
}

interface StepOutcome {
  agentId: string;
  result: ActionResult;
  durationMs: number;
}

export class AnalyticsOrchestrator {
  private readonly factory: AgentFactory;
  private readonly routes: RoutingTable;
  private readonly contextSources: ContextSources;
  private readonly metrics: MetricsSink;
  private readonly agentTimeoutMs: number;
  private readonly baseTokenBudget?: number;
  private readonly rolePermissions: Readonly<Record<Role, PermissionLevel>>;
  private readonly eventBus: EventBus;
  private readonly log: Logger;

  constructor(config: OrchestratorConfig) {
    this.factory = config.factory;
    this.routes = config.routes ?? ROUTING_TABLE;
    this.contextSources = config.contextSources ?? EMPTY_SOURCES;
    this.metrics = config.metrics ?? new AtomicMetricsSink();
    this.agentTimeoutMs = config.agentTimeoutMs ?? 5000;
    this.baseTokenBudget = config.baseTokenBudget;
    this.rolePermissions = config.rolePermissions ?? ROLE_PERMISSIONS;
    this.eventBus = config.eventBus ?? new SimpleEventBus();
    this.log = config.logger ?? createLogger('orchestrator');

    if (config.onEvent) {
      const handler = config.onEvent;
      const eventTypes: DomainEventType[] = [
        'RequestReceived', 'StateChanged', 'AgentInvoked',
        'AgentCompleted', 'AgentFailed', 'ResponseSynthesized',
      ];
      for (const type of eventTypes) {
        this.eventBus.on(type, (e) => handler({ type: e.type, payload: e.payload }));
      }
    }
  }

  async process(request: AnalyticsRequest, options: ProcessOptions = {}): Promise<AnalyticsResponse> {
    const started = performance.now();
    const requestId = request.requestId ?? randomUUID();
    const trace: RequestState[] = ['received'];
    const advance = (to: RequestState): void => {
      const from = trace[trace.length - 1] ?? 'received';
      if (!TRANSITIONS[from].includes(to)) {
        throw new InvalidTransitionError(from, to);
      }
      trace.push(to);
      this.emit('StateChanged', { requestId, from, to });
    };

    this.emit('RequestReceived', { requestId, queryType: request.queryType, userId: request.userId });
    let queryType: QueryType | undefined;
    let role: Role | undefined;
    let budgetFraction: number | undefined;
    let context: ContextSummary | undefined;

    try {
      const parsed = requestSchema.safeParse(request);
      if (!parsed.success) {
        throw new InvalidRequestError(`Invalid request: ${formatZodError(parsed.error)}`);
      }
      const input = parsed.data;
      const queryTypeResult = queryTypeSchema.safeParse(input.queryType);
      if (!queryTypeResult.success) {
        throw new InvalidRequestError(`Unsupported query type '${input.queryType}'`, {
          supported: [...QUERY_TYPES],
        });
      }
      queryType = queryTypeResult.data;

      const built = buildContext(input, this.contextSources, { baseTokenBudget: this.baseTokenBudget });
      role = built.role;
      budgetFraction = built.budgetFraction;
      context = summarizeContext(built.context);
      advance('role_detected');

      const steps = this.routes[queryType];
      const permission = options.grantedPermission ?? this.rolePermissions[built.role];
      advance('agents_selected');
      this.log.info(
        { requestId, queryType, role, permission, agents: steps.map((s) => s.agentId) },
        'Agents selected',
      );

      advance('executing');
      const caller: Omit<CallerContext, 'signal'> = {
        requestId,
        userId: input.userId,
        query: input.query,
        role: built.role,
        permission,
        budgetFraction: built.budgetFraction,
        context: built.context,
        contextHints: input.contextHints,
      };
      const outcomes = await Promise.all(
        steps.map((step) => this.invoke(step, input.parameters, caller, options.signal)),
      );

      advance('synthesizing');
      const results: Record<string, ActionResult> = {};
      const agentTimings: Record<string, number> = {};
      for (const outcome of outcomes) {
        results[outcome.agentId] = outcome.result;
        agentTimings[outcome.agentId] = outcome.durationMs;
      }
      const status = overallStatus(results);
      const insights = synthesizeInsights(steps, results);
      advance('completed');

      const executionTimeMs = performance.now() - started;
      this.metrics.recordRequest(status === 'success', executionTimeMs);
      this.emit('ResponseSynthesized', { requestId, status, agents: Object.keys(results) });
      this.log.info({ requestId, status, executionTimeMs }, 'Request completed');

      return {
        requestId,
        status,
        queryType,
        role,
        budgetFraction,
        context,
        results,
        insights,
        executionTimeMs,
        agentTimings,
        trace,
      };
    } catch (err) {
      const message = errorMessage(err);
      const current = trace[trace.length - 1];
      if (current !== 'failed') {
        trace.push('failed');
        this.emit('StateChanged', { requestId, from: current, to: 'failed' });
      }
      const executionTimeMs = performance.now() - started;
      this.metrics.recordRequest(false, executionTimeMs);
      this.log.error({ requestId, error: message }, 'Request failed');

      return {
        requestId,
        status: 'error',
        queryType,
        role,
        budgetFraction,
        context,
        results: {},
        insights: [],
        executionTimeMs,
        agentTimings: {},
        trace,
        errorMessage: message,
      };
    }
  }

  /** Never rejects: every failure lands in the agent's own result slot. */
  private async invoke(
    step: RouteStep,
    requestParameters: Readonly<Record<string, unknown>>,
    caller: Omit<CallerContext, 'signal'>,
    signal?: AbortSignal,
  ): Promise<StepOutcome> {
    const { requestId } = caller;
    const agent = this.factory.get(step.agentId);
    if (!agent) {
      return this.settle(step, 0, { status: 'error', error: toActionError(new AgentNotFoundError(step.agentId)) });
    }

    const check = checkPermission(agent, step.action, caller.permission);
    const action = agent.resolveAction(step.action);
    if (!check.allowed || action === undefined) {
      const error = toActionError(refusalError(agent.agentId, step.action, check));
      this.log.warn({ requestId, agentId: agent.agentId, action: step.action, code: error.code }, 'Agent call refused');
      return this.settle(step, 0, { status: 'error', error });
    }

    this.emit('AgentInvoked', { requestId, agentId: agent.agentId, action: step.action });
    const parameters = { ...requestParameters, ...step.parameters };
    const t0 = performance.now();
    let result: ActionResult;
    try {
      result = await withTimeout(
        (callSignal) => agent.execute(action, parameters, { ...caller, signal: callSignal }),
        {
          timeoutMs: this.agentTimeoutMs,
          signal,
          onTimeout: () => new AgentTimeoutError(agent.agentId, this.agentTimeoutMs),
          onAbort: () => new AgentExecutionError(agent.agentId, 'Request cancelled before the agent finished'),
        },
      );
    } catch (err) {
      if (err instanceof AgentTimeoutError) {
        this.log.warn({ requestId, agentId: agent.agentId, timeoutMs: this.agentTimeoutMs }, 'Agent timed out');
        result = { status: 'error', error: toActionError(err) };
      } else if (signal?.aborted) {
        this.log.warn({ requestId, agentId: agent.agentId }, 'Agent call cancelled');
        result = { status: 'error', error: toActionError(err) };
      } else {
        this.log.error({ requestId, agentId: agent.agentId, error: errorMessage(err) }, 'Agent threw');
        const failure = new AgentExecutionError(agent.agentId, errorMessage(err), err);
        result = { status: 'error', error: toActionError(failure) };
      }
    }
    return this.settle(step, performance.now() - t0, result);
  }

  private settle(step: RouteStep, durationMs: number, result: ActionResult): StepOutcome {
    const success = result.status === 'success';
    this.metrics.recordAgentCall(step.agentId, success, durationMs);
    this.emit(success ? 'AgentCompleted' : 'AgentFailed', {
      agentId: step.agentId,
      action: step.action,
      durationMs,
      ...(result.status === 'error' ? { code: result.error.code } : {}),
    });
    return { agentId: step.agentId, result, durationMs };
  }

  // Observers never change a request's outcome
  private emit(type: DomainEventType, payload: Record<string, unknown>): void {
    try {
      this.eventBus.emit({
        eventId: randomUUID(),
        type,
        timestamp: new Date(),
        sourceContext: 'AnalyticsOrchestration',
        payload,
      });
    } catch (err) {
      this.log.error({ eventType: type, error: errorMessage(err) }, 'Event emission failed');
    }
  }
}
