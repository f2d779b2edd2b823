// Static routing: each query type maps to an ordered list of agent actions.
// Agent ids are the default instance ids created by the runtime.

import type { AgentActionMap, AgentType } from '../types/agents.js';
import type { QueryType } from '../types/analysis.js';

export type RouteStep = {
  [K in AgentType]: {
    readonly agentType: K;
    readonly agentId: string;
    readonly action: AgentActionMap[K];
    readonly parameters?: Readonly<Record<string, unknown>>;
  };
}[AgentType];

export type RoutingTable = Readonly<Record<QueryType, readonly RouteStep[]>>;

export const DEFAULT_INSTANCE_IDS: Readonly<Record<AgentType, string>> = {
  model_engine: 'model_engine',
  insight_generator: 'insight_generator',
  learning_navigator: 'learning_navigator',
  system_monitor: 'system_monitor',
};

const id = DEFAULT_INSTANCE_IDS;

export const ROUTING_TABLE: RoutingTable = {
  prediction: [
    { agentType: 'model_engine', agentId: id.model_engine, action: 'predict_game_outcome' },
    { agentType: 'insight_generator', agentId: id.insight_generator, action: 'generate_analysis' },
  ],
  ensemble: [
    { agentType: 'model_engine', agentId: id.model_engine, action: 'ensemble_prediction' },
    { agentType: 'insight_generator', agentId: id.insight_generator, action: 'generate_analysis' },
  ],
  model_comparison: [
    { agentType: 'model_engine', agentId: id.model_engine, action: 'model_comparison' },
  ],
  analysis: [
    { agentType: 'insight_generator', agentId: id.insight_generator, action: 'generate_analysis' },
    { agentType: 'learning_navigator', agentId: id.learning_navigator, action: 'explain_concepts' },
  ],
  statistics: [
    { agentType: 'insight_generator', agentId: id.insight_generator, action: 'statistical_summary' },
  ],
  learning: [
    { agentType: 'learning_navigator', agentId: id.learning_navigator, action: 'guide_learning_path' },
  ],
  system_status: [
    { agentType: 'system_monitor', agentId: id.system_monitor, action: 'model_cache_audit' },
    { agentType: 'model_engine', agentId: id.model_engine, action: 'list_models' },
  ],
  health: [
    { agentType: 'system_monitor', agentId: id.system_monitor, action: 'performance_snapshot' },
    { agentType: 'model_engine', agentId: id.model_engine, action: 'model_health_check' },
  ],
  general: [
    { agentType: 'learning_navigator', agentId: id.learning_navigator, action: 'recommend_content' },
  ],
};

/**
 * Structural problems in a routing table: empty routes and agent ids repeated
 * within one route (results are keyed by agent id).
 */
export function validateRoutingTable(table: RoutingTable): string[] {
  const problems: string[] = [];
  for (const [queryType, steps] of Object.entries(table)) {
    if (steps.length === 0) {
      problems.push(`${queryType}: route has no steps`);
      continue;
    }
    const seen = new Set<string>();
    for (const step of steps) {
      if (seen.has(step.agentId)) {
        problems.push(`${queryType}: agent '${step.agentId}' appears more than once`);
      }
      seen.add(step.agentId);
    }
  }
  return problems;
}
