export { AnalyticsOrchestrator } from './coordinator.js';
export type { OrchestratorConfig } from './coordinator.js';
export { AgentFactory, AGENT_TYPES, registerDefaultAgents } from './agent-factory.js';
export { checkPermission, validateCapabilities, ROLE_PERMISSIONS } from './permissions.js';
export type { PermissionCheck } from './permissions.js';
export {
  buildContext, detectRole, assembleContext, collectEntities, estimateTokens,
  ROLE_BUDGETS, DEFAULT_BASE_TOKEN_BUDGET, EMPTY_SOURCES,
} from './context-manager.js';
export { AtomicMetricsSink, InMemoryMetricsRecorder } from './metrics.js';
export type { MetricsSink, MetricsSnapshot } from './metrics.js';
export { overallStatus, synthesizeInsights } from './synthesizer.js';
export { createAnalyticsRuntime } from './runtime.js';
export type { AnalyticsRuntime, RuntimeOptions } from './runtime.js';
