// Model Execution Engine: single and ensemble inference over the model catalog

import type {
  EnsembleResult, FeatureMap, ModelDescriptor, ModelHandle, ModelSummary, ModelTask,
  PredictionResult,
} from '../types/models.js';
import type { ModelRegistry } from './model-registry.js';
import {
  WIN_PROBABILITY_CEILING, WIN_PROBABILITY_FLOOR, clamp, effectiveAccuracy, marginConfidence,
  normalizedDisagreement, probabilityConfidence, resolveWeights, weightedMean,
} from './ensemble.js';
import { FeatureMismatchError, InvalidParametersError, ModelNotFoundError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

function missingFor(descriptor: ModelDescriptor, features: FeatureMap): string[] {
  return descriptor.requiredFeatures.filter((name) => {
    const value = features[name];
    return value === undefined || !Number.isFinite(value);
  });
}

export interface ExecutionEngineConfig {
  catalog: readonly ModelDescriptor[];
  registry: ModelRegistry;
  /** Recency window for historical accuracy; unset uses the catalog figure */
  accuracyWindow?: number;
  /** Margins are scored against [-marginRange, marginRange]. Default: 70 */
  marginRange?: number;
  /** Confidence reported for clamped, non-finite outputs. Default: 0.1 */
  lowConfidence?: number;
  logger?: Logger;
}

export class ModelExecutionEngine {
  private readonly catalog: Map<string, ModelDescriptor>;
  private readonly registry: ModelRegistry;
  private readonly accuracyWindow?: number;
  private readonly marginRange: number;
  private readonly lowConfidence: number;
  private readonly log: Logger;

  constructor(config: ExecutionEngineConfig) {
    this.catalog = new Map(config.catalog.map((d) => [d.id, d]));
    this.registry = config.registry;
    this.accuracyWindow = config.accuracyWindow;
    this.marginRange = config.marginRange ?? 70;
    this.lowConfidence = config.lowConfidence ?? 0.1;
    this.log = config.logger ?? createLogger('execution-engine');
  }

  /** Catalogued models not marked unavailable. Safe to call repeatedly. */
  listAvailableModels(): ModelSummary[] {
    return [...this.catalog.values()]
      .filter((d) => !this.registry.isUnavailable(d.id))
      .map((d) => this.summarize(d));
  }

  describeModel(modelId: string): ModelSummary | undefined {
    const descriptor = this.catalog.get(modelId);
    return descriptor ? this.summarize(descriptor) : undefined;
  }

  catalogIds(): string[] {
    return [...this.catalog.keys()];
  }

  /** Features missing (or non-finite) for a model; empty when it can run. */
  missingFeatures(modelId: string, features: FeatureMap): string[] {
    return missingFor(this.requireDescriptor(modelId), features);
  }

  /** Load a model ahead of use; errors as for predict. */
  async loadModel(modelId: string): Promise<void> {
    await this.registry.acquire(this.requireDescriptor(modelId));
  }

  async predict(modelId: string, features: FeatureMap): Promise<PredictionResult> {
    const descriptor = this.requireDescriptor(modelId);
    this.assertFeatures(descriptor, features);
    const handle = await this.registry.acquire(descriptor);
    return this.score(descriptor, handle, features);
  }

  async predictEnsemble(
    features: FeatureMap,
    modelIds: readonly string[],
    weights?: readonly number[],
  ): Promise<EnsembleResult> {
    if (modelIds.length === 0) {
      throw new InvalidParametersError('An ensemble needs at least one model');
    }
    if (new Set(modelIds).size !== modelIds.length) {
      throw new InvalidParametersError('Ensemble model ids must be unique', { modelIds: [...modelIds] });
    }
    const descriptors = modelIds.map((id) => this.requireDescriptor(id));
    const resolved = resolveWeights(
      descriptors.map((d) => effectiveAccuracy(d, this.accuracyWindow)),
      weights,
    );
    for (const descriptor of descriptors) {
      this.assertFeatures(descriptor, features);
    }

    const predictions = await Promise.all(
      descriptors.map(async (d) => this.score(d, await this.registry.acquire(d), features)),
    );

    const weightById: Record<string, number> = {};
    descriptors.forEach((d, i) => {
      weightById[d.id] = resolved[i] ?? 0;
    });

    const margin = this.combine(predictions, resolved, 'margin');
    const probability = this.combine(predictions, resolved, 'win_probability');
    const disagreement: Partial<Record<ModelTask, number>> = {};
    const confidences: number[] = [];
    if (margin) {
      disagreement.margin = margin.disagreement;
      confidences.push(1 - margin.disagreement);
    }
    if (probability) {
      disagreement.win_probability = probability.disagreement;
      confidences.push(1 - probability.disagreement);
    }

    const overflow = predictions.some((p) => p.overflow);
    let confidence = Math.min(...confidences);
    if (overflow) confidence = Math.min(confidence, this.lowConfidence);

    return {
      modelIds: [...modelIds],
      weights: weightById,
      predictions,
      margin: margin?.value,
      winProbability: probability
        ? clamp(probability.value, WIN_PROBABILITY_FLOOR, WIN_PROBABILITY_CEILING)
        : undefined,
      disagreement,
      confidence,
      overflow,
    };
  }

  private combine(
    predictions: readonly PredictionResult[],
    weights: readonly number[],
    task: ModelTask,
  ): { value: number; disagreement: number } | undefined {
    const values: number[] = [];
    const taskWeights: number[] = [];
    predictions.forEach((p, i) => {
      if (p.task === task) {
        values.push(p.value);
        taskWeights.push(weights[i] ?? 0);
      }
    });
    if (values.length === 0) return undefined;

    const range: [number, number] = task === 'margin' ? [-this.marginRange, this.marginRange] : [0, 1];
    // Models given zero weight still count towards disagreement
    const value = taskWeights.some((w) => w > 0)
      ? weightedMean(values, taskWeights)
      : weightedMean(values, values.map(() => 1));
    return { value, disagreement: normalizedDisagreement(values, range) };
  }

  private score(descriptor: ModelDescriptor, handle: ModelHandle, features: FeatureMap): PredictionResult {
    const raw = handle.predict(features);
    const base = { modelId: descriptor.id, task: descriptor.task, version: handle.version };

    if (!Number.isFinite(raw)) {
      const value = this.clampNonFinite(descriptor.task, raw);
      this.log.warn({ modelId: descriptor.id, raw: String(raw), clampedTo: value }, 'Numeric overflow in model output');
      return { ...base, value, confidence: this.lowConfidence, overflow: true };
    }

    if (descriptor.task === 'margin') {
      return { ...base, value: raw, confidence: marginConfidence(raw), overflow: false };
    }
    const probability = clamp(raw, 0, 1);
    return { ...base, value: probability, confidence: probabilityConfidence(probability), overflow: false };
  }

  private clampNonFinite(task: ModelTask, raw: number): number {
    if (task === 'margin') {
      if (Number.isNaN(raw)) return 0;
      return raw > 0 ? this.marginRange : -this.marginRange;
    }
    if (Number.isNaN(raw)) return 0.5;
    return raw > 0 ? WIN_PROBABILITY_CEILING : WIN_PROBABILITY_FLOOR;
  }

  private assertFeatures(descriptor: ModelDescriptor, features: FeatureMap): void {
    const missing = missingFor(descriptor, features);
    if (missing.length > 0) {
      throw new FeatureMismatchError(descriptor.id, missing);
    }
  }

  private requireDescriptor(modelId: string): ModelDescriptor {
    const descriptor = this.catalog.get(modelId);
    if (!descriptor) {
      throw new ModelNotFoundError(modelId, 'not in the model catalog');
    }
    return descriptor;
  }

  private summarize(d: ModelDescriptor): ModelSummary {
    return {
      id: d.id,
      task: d.task,
      requiredFeatures: [...d.requiredFeatures],
      historicalAccuracy: effectiveAccuracy(d, this.accuracyWindow),
      version: d.version,
      description: d.description,
    };
  }
}
