// Model engine agent: game predictions, ensembles and model comparisons

import type {
  ActionError, AgentCapability, AgentOutput, CallerContext, ModelEngineAction,
} from '../types/agents.js';
import type { FeatureMap, PredictionResult } from '../types/models.js';
import type { PermissionLevel } from '../types/permissions.js';
import { BaseAgent, assertNever } from './base-agent.js';
import {
  comparisonParamsSchema, ensembleParamsSchema, predictParamsSchema, type GameSelector,
} from './params.js';
import { formatPercent, formatSigned, imputeZero, resolveGame, type ResolvedGame } from './game-features.js';
import { AgentExecutionError, ModelNotFoundError, isAnalyticsError, toActionError } from '../utils/errors.js';

const CAPABILITIES: readonly AgentCapability<ModelEngineAction>[] = [
  {
    name: 'predict_game_outcome',
    description: 'Predict the margin or home win probability of one game with one model',
    requiredPermission: 'READ_EXECUTE',
    tools: ['model_registry', 'feature_table'],
    dataAccess: ['game_features', 'model_artifacts'],
    estimatedSeconds: 2,
  },
  {
    name: 'ensemble_prediction',
    description: 'Accuracy-weighted ensemble prediction across several models',
    requiredPermission: 'READ_EXECUTE',
    tools: ['model_registry', 'feature_table'],
    dataAccess: ['game_features', 'model_artifacts'],
    estimatedSeconds: 3,
  },
  {
    name: 'model_comparison',
    description: 'Run every requested model on the same game and compare outputs',
    requiredPermission: 'READ_EXECUTE_WRITE',
    tools: ['model_registry', 'feature_table'],
    dataAccess: ['game_features', 'model_artifacts'],
    estimatedSeconds: 5,
  },
  {
    name: 'list_models',
    description: 'List models available for prediction',
    requiredPermission: 'READ_ONLY',
    tools: ['model_registry'],
    dataAccess: ['model_catalog'],
    estimatedSeconds: 0.1,
  },
  {
    name: 'model_health_check',
    description: 'Load every catalogued model and report which are ready',
    requiredPermission: 'READ_EXECUTE',
    tools: ['model_registry'],
    dataAccess: ['model_artifacts'],
    estimatedSeconds: 5,
  },
];

export interface ModelComparisonEntry {
  modelId: string;
  prediction?: PredictionResult;
  error?: ActionError;
}

export type ModelHealth = {
  modelId: string;
  status: 'ready' | 'missing' | 'unavailable';
  detail?: string;
};

function hintedModels(hints: Readonly<Record<string, unknown>>): string[] {
  const models = hints.models;
  if (typeof models === 'string') return [models];
  if (Array.isArray(models)) return models.filter((m): m is string => typeof m === 'string');
  return [];
}

function describePrediction(p: PredictionResult): string {
  const confidence = p.confidence.toFixed(2);
  return p.task === 'margin'
    ? `Predicted margin (${p.modelId}): ${formatSigned(p.value)} points, confidence ${confidence}`
    : `Home win probability (${p.modelId}): ${formatPercent(p.value)}, confidence ${confidence}`;
}

function mean(values: readonly number[]): number | undefined {
  return values.length === 0 ? undefined : values.reduce((sum, v) => sum + v, 0) / values.length;
}

export class ModelEngineAgent extends BaseAgent<ModelEngineAction> {
  readonly agentType = 'model_engine';
  readonly ceiling: PermissionLevel = 'READ_EXECUTE_WRITE';

  listCapabilities(): readonly AgentCapability<ModelEngineAction>[] {
    return CAPABILITIES;
  }

  protected async perform(
    action: ModelEngineAction,
    parameters: Readonly<Record<string, unknown>>,
    caller: CallerContext,
  ): Promise<AgentOutput> {
    switch (action) {
      case 'predict_game_outcome':
        return this.predictGame(predictParamsSchema.parse(parameters), caller);
      case 'ensemble_prediction':
        return this.ensemble(ensembleParamsSchema.parse(parameters));
      case 'model_comparison':
        return this.compare(comparisonParamsSchema.parse(parameters), caller);
      case 'list_models':
        return this.listModels();
      case 'model_health_check':
        return this.healthCheck();
      default:
        return assertNever(action);
    }
  }

  private async predictGame(
    params: GameSelector & { model_id?: string },
    caller: CallerContext,
  ): Promise<AgentOutput> {
    const { engine } = this.deps;
    const modelId = params.model_id ??
      hintedModels(caller.contextHints).find((id) => engine.describeModel(id) !== undefined) ??
      this.defaultModelIds()[0];
    if (modelId === undefined) {
      throw new ModelNotFoundError('default', 'no models are available');
    }

    const { game, features, imputed } = this.prepare(params, [modelId]);
    const prediction = await engine.predict(modelId, features);
    const insights = [describePrediction(prediction)];
    if (prediction.overflow) {
      insights.push(`Warning: ${modelId} produced a non-finite output; the value was clamped`);
    }
    if (imputed.length > 0) {
      insights.push(`Imputed as zero: ${imputed.join(', ')}`);
    }
    return { data: { prediction, gameKey: game.gameKey, imputed }, insights };
  }

  private async ensemble(params: GameSelector & { model_ids?: string[]; weights?: number[] }): Promise<AgentOutput> {
    const modelIds = params.model_ids ?? this.defaultModelIds();
    if (modelIds.length === 0) {
      throw new ModelNotFoundError('default', 'no models are available');
    }
    const { game, features, imputed } = this.prepare(params, modelIds);
    const result = await this.deps.engine.predictEnsemble(features, modelIds, params.weights);

    const insights: string[] = [];
    if (result.margin !== undefined) {
      insights.push(`Ensemble margin: ${formatSigned(result.margin)} points across ${modelIds.length} models`);
    }
    if (result.winProbability !== undefined) {
      insights.push(`Ensemble home win probability: ${formatPercent(result.winProbability)}`);
    }
    insights.push(`Ensemble confidence: ${result.confidence.toFixed(2)}`);
    if (result.overflow) {
      insights.push('Warning: at least one model produced a non-finite output; confidence lowered');
    }
    if (imputed.length > 0) {
      insights.push(`Imputed as zero: ${imputed.join(', ')}`);
    }
    return { data: { ensemble: result, gameKey: game.gameKey, imputed }, insights };
  }

  private async compare(params: GameSelector & { model_ids?: string[] }, caller: CallerContext): Promise<AgentOutput> {
    const modelIds = params.model_ids ?? this.defaultModelIds();
    const { game, features, imputed } = this.prepare(params, modelIds);

    const entries = await Promise.all(modelIds.map(async (modelId): Promise<ModelComparisonEntry> => {
      caller.signal.throwIfAborted();
      try {
        return { modelId, prediction: await this.deps.engine.predict(modelId, features) };
      } catch (err) {
        if (isAnalyticsError(err) && err.recoverable) {
          return { modelId, error: toActionError(err) };
        }
        throw err;
      }
    }));

    const succeeded = entries.flatMap((e) => (e.prediction ? [e.prediction] : []));
    if (succeeded.length === 0) {
      throw new AgentExecutionError(this.agentId, `All ${modelIds.length} models failed to predict`);
    }
    const margins = succeeded.filter((p) => p.task === 'margin').map((p) => p.value);
    const probabilities = succeeded.filter((p) => p.task === 'win_probability').map((p) => p.value);

    const insights: string[] = [];
    if (margins.length > 0) {
      insights.push(
        `Margin predictions range ${formatSigned(Math.min(...margins))} to ${formatSigned(Math.max(...margins))} points across ${margins.length} models`,
      );
    }
    if (probabilities.length > 0) {
      insights.push(
        `Home win probability ranges ${formatPercent(Math.min(...probabilities))} to ${formatPercent(Math.max(...probabilities))} across ${probabilities.length} models`,
      );
    }
    for (const entry of entries) {
      if (entry.error) insights.push(`${entry.modelId} skipped (${entry.error.code})`);
    }

    return {
      data: {
        comparisons: entries,
        averageMargin: mean(margins),
        averageWinProbability: mean(probabilities),
        gameKey: game.gameKey,
        imputed,
      },
      insights,
    };
  }

  private async listModels(): Promise<AgentOutput> {
    const models = this.deps.engine.listAvailableModels();
    return {
      data: { models },
      insights: [`${models.length} models available: ${models.map((m) => m.id).join(', ')}`],
    };
  }

  private async healthCheck(): Promise<AgentOutput> {
    const { engine } = this.deps;
    const checks = await Promise.all(engine.catalogIds().map(async (modelId): Promise<ModelHealth> => {
      try {
        await engine.loadModel(modelId);
        return { modelId, status: 'ready' };
      } catch (err) {
        const error = toActionError(err);
        return {
          modelId,
          status: error.code === 'ModelNotFound' ? 'missing' : 'unavailable',
          detail: error.message,
        };
      }
    }));
    const ready = checks.filter((c) => c.status === 'ready').length;
    return {
      data: { models: checks },
      insights: [
        `${ready}/${checks.length} models ready`,
        ...checks.filter((c) => c.status !== 'ready').map((c) => `${c.modelId}: ${c.status}`),
      ],
    };
  }

  private defaultModelIds(): string[] {
    return this.deps.engine.listAvailableModels().map((m) => m.id);
  }

  private prepare(
    params: GameSelector,
    modelIds: readonly string[],
  ): { game: ResolvedGame; features: FeatureMap; imputed: string[] } {
    const game = resolveGame(params, this.deps.featureStore);
    if (params.impute !== 'zero') {
      return { game, features: game.features, imputed: [] };
    }
    const required = [...new Set(
      modelIds.flatMap((id) => this.deps.engine.describeModel(id)?.requiredFeatures ?? []),
    )];
    const { features, imputed } = imputeZero(game.features, required);
    return { game, features, imputed };
  }
}
