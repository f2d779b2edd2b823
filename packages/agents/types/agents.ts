// Agent contract: capability declarations, tagged results and injected collaborators

import type { PermissionLevel } from './permissions.js';
import type { Role, AssembledContext } from './context.js';
import type { EventBus } from './events.js';
import type { ModelExecutionEngine } from '../models/execution-engine.js';
import type { ModelRegistry } from '../models/model-registry.js';
import type { FeatureStore } from '../models/feature-store.js';
import type { ContentCatalog } from '../content/content-catalog.js';
import type { MetricsSink } from '../orchestrator/metrics.js';

export type AgentType =
  | 'model_engine'
  | 'insight_generator'
  | 'learning_navigator'
  | 'system_monitor';

export type ModelEngineAction =
  | 'predict_game_outcome'
  | 'ensemble_prediction'
  | 'model_comparison'
  | 'list_models'
  | 'model_health_check';

export type InsightAction = 'generate_analysis' | 'statistical_summary';

export type LearningAction = 'recommend_content' | 'explain_concepts' | 'guide_learning_path';

export type MonitorAction = 'performance_snapshot' | 'model_cache_audit';

export interface AgentActionMap {
  model_engine: ModelEngineAction;
  insight_generator: InsightAction;
  learning_navigator: LearningAction;
  system_monitor: MonitorAction;
}

export interface AgentCapability<A extends string = string> {
  readonly name: A;
  readonly description: string;
  readonly requiredPermission: PermissionLevel;
  readonly tools: readonly string[];
  readonly dataAccess: readonly string[];
  readonly estimatedSeconds: number;
}

export type AgentErrorCode =
  | 'PermissionDenied'
  | 'CapabilityNotFound'
  | 'FeatureMismatch'
  | 'ModelNotFound'
  | 'ModelLoadFailure'
  | 'NumericOverflow'
  | 'Timeout'
  | 'AgentExecutionError'
  | 'AgentNotFound'
  | 'InvalidParameters'
  | 'DataNotFound';

export interface ActionError {
  readonly code: AgentErrorCode;
  readonly message: string;
}

export type ActionResult<T = unknown> =
  | { readonly status: 'success'; readonly payload: T; readonly insights: readonly string[] }
  | { readonly status: 'error'; readonly error: ActionError };

/** What an agent action produces before the base class tags it. */
export interface AgentOutput<T = unknown> {
  data: T;
  insights: string[];
}

export interface CallerContext {
  readonly requestId: string;
  readonly userId: string;
  readonly query: string;
  readonly role: Role;
  readonly permission: PermissionLevel;
  readonly budgetFraction: number;
  readonly context: AssembledContext;
  readonly contextHints: Readonly<Record<string, unknown>>;
  readonly signal: AbortSignal;
}

export interface AnalyticsAgent<A extends string = string> {
  readonly agentId: string;
  readonly agentType: AgentType;
  readonly ceiling: PermissionLevel;
  listCapabilities(): readonly AgentCapability<A>[];
  resolveAction(name: string): A | undefined;
  execute(
    action: A,
    parameters: Readonly<Record<string, unknown>>,
    caller: CallerContext,
  ): Promise<ActionResult>;
}

export interface AgentDependencies {
  engine: ModelExecutionEngine;
  registry: ModelRegistry;
  featureStore: FeatureStore;
  content: ContentCatalog;
  metrics: MetricsSink;
  eventBus: EventBus;
}

export type AgentConstructor = new (agentId: string, deps: AgentDependencies) => AnalyticsAgent;
