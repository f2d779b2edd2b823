// Insight generator: matchup edges and feature statistics from the feature table

import type { AgentCapability, AgentOutput, InsightAction } from '../types/agents.js';
import type { FeatureMap } from '../types/models.js';
import type { PermissionLevel } from '../types/permissions.js';
import { BaseAgent, assertNever } from './base-agent.js';
import { gameSelectorSchema, statisticsParamsSchema } from './params.js';
import { formatSigned, resolveGame } from './game-features.js';
import { DataNotFoundError } from '../utils/errors.js';

const CAPABILITIES: readonly AgentCapability<InsightAction>[] = [
  {
    name: 'generate_analysis',
    description: 'Compare paired home/away metrics for a game and surface the largest edges',
    requiredPermission: 'READ_EXECUTE',
    tools: ['feature_table'],
    dataAccess: ['game_features'],
    estimatedSeconds: 1,
  },
  {
    name: 'statistical_summary',
    description: 'Summary statistics of one feature across the feature table',
    requiredPermission: 'READ_EXECUTE',
    tools: ['feature_table'],
    dataAccess: ['game_features'],
    estimatedSeconds: 1,
  },
];

const MAX_EDGES = 3;

export interface MetricEdge {
  metric: string;
  home: number;
  away: number;
  difference: number;
  relative: number;   // difference scaled by the larger magnitude
}

export interface FeatureStatistics {
  feature: string;
  count: number;
  mean: number;
  std: number;
  min: number;
  max: number;
}

/** Paired `home_x` / `away_x` metrics, largest relative edge first. */
export function metricEdges(features: FeatureMap): MetricEdge[] {
  const edges: MetricEdge[] = [];
  for (const [name, home] of Object.entries(features)) {
    if (!name.startsWith('home_')) continue;
    const metric = name.slice('home_'.length);
    const away = features[`away_${metric}`];
    if (away === undefined || !Number.isFinite(home) || !Number.isFinite(away)) continue;
    const difference = home - away;
    const scale = Math.max(Math.abs(home), Math.abs(away));
    edges.push({ metric, home, away, difference, relative: scale === 0 ? 0 : difference / scale });
  }
  return edges.sort((a, b) => Math.abs(b.relative) - Math.abs(a.relative) || a.metric.localeCompare(b.metric));
}

export function summarize(feature: string, values: readonly number[]): FeatureStatistics {
  const count = values.length;
  const mean = values.reduce((sum, v) => sum + v, 0) / count;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / count;
  return {
    feature,
    count,
    mean,
    std: Math.sqrt(variance),
    min: Math.min(...values),
    max: Math.max(...values),
  };
}

function round(value: number): string {
  return Number(value.toFixed(3)).toString();
}

export class InsightGenerator extends BaseAgent<InsightAction> {
  readonly agentType = 'insight_generator';
  readonly ceiling: PermissionLevel = 'READ_EXECUTE_WRITE';

  listCapabilities(): readonly AgentCapability<InsightAction>[] {
    return CAPABILITIES;
  }

  protected async perform(
    action: InsightAction,
    parameters: Readonly<Record<string, unknown>>,
  ): Promise<AgentOutput> {
    switch (action) {
      case 'generate_analysis':
        return this.analyze(parameters);
      case 'statistical_summary':
        return this.statistics(parameters);
      default:
        return assertNever(action);
    }
  }

  private async analyze(parameters: Readonly<Record<string, unknown>>): Promise<AgentOutput> {
    const game = resolveGame(gameSelectorSchema.parse(parameters), this.deps.featureStore);
    const edges = metricEdges(game.features);
    const home = game.game?.homeTeam ?? 'Home';
    const insights = edges.length === 0
      ? ['No paired home/away metrics available for comparison']
      : edges.slice(0, MAX_EDGES).map((e) =>
          `${home} ${e.difference >= 0 ? 'leads' : 'trails'} on ${e.metric} (${round(e.home)} vs ${round(e.away)}, ${formatSigned(e.relative * 100)}%)`);
    return { data: { gameKey: game.gameKey, edges }, insights };
  }

  private async statistics(parameters: Readonly<Record<string, unknown>>): Promise<AgentOutput> {
    const params = statisticsParamsSchema.parse(parameters);
    const rows = this.deps.featureStore.rows({ season: params.season, week: params.week, team: params.team });
    const values = rows
      .map((row) => row.features[params.feature])
      .filter((v): v is number => v !== undefined && Number.isFinite(v));
    if (values.length === 0) {
      throw new DataNotFoundError(`No values for feature '${params.feature}'`, { feature: params.feature });
    }
    const stats = summarize(params.feature, values);
    return {
      data: stats,
      insights: [
        `${stats.feature}: mean ${round(stats.mean)} (sd ${round(stats.std)}) over ${stats.count} games, range ${round(stats.min)} to ${round(stats.max)}`,
      ],
    };
  }
}
