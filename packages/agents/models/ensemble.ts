// Weighting and combination math for ensemble predictions

import type { ModelDescriptor } from '../types/models.js';
import { InvalidParametersError } from '../utils/errors.js';

export const WIN_PROBABILITY_FLOOR = 0.01;
export const WIN_PROBABILITY_CEILING = 0.99;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Accuracy used for default weighting. With a window set, the mean of the last
 * `window` history entries wins over the catalog figure.
 */
export function effectiveAccuracy(descriptor: ModelDescriptor, window?: number): number {
  const history = descriptor.accuracyHistory;
  if (window === undefined || !history || history.length === 0) {
    return descriptor.historicalAccuracy;
  }
  const recent = history.slice(-window);
  return recent.reduce((sum, v) => sum + v, 0) / recent.length;
}

/**
 * Scale to sum 1. A total that overflows is brought back into range by
 * dividing through by the largest weight first.
 */
export function normalize(weights: readonly number[]): number[] {
  const total = weights.reduce((sum, w) => sum + w, 0);
  if (Number.isFinite(total)) {
    return weights.map((w) => w / total);
  }
  const largest = Math.max(...weights);
  return normalize(weights.map((w) => w / largest));
}

/**
 * Final ensemble weights. Explicit weights are validated and normalized;
 * otherwise accuracies are normalized, falling back to uniform when all are zero.
 */
export function resolveWeights(accuracies: readonly number[], explicit?: readonly number[]): number[] {
  if (explicit !== undefined) {
    if (explicit.length !== accuracies.length) {
      throw new InvalidParametersError(
        `Expected ${accuracies.length} weights, got ${explicit.length}`,
        { expected: accuracies.length, received: explicit.length },
      );
    }
    if (explicit.some((w) => !Number.isFinite(w) || w < 0)) {
      throw new InvalidParametersError('Weights must be finite and non-negative');
    }
    if (!explicit.some((w) => w > 0)) {
      throw new InvalidParametersError('Weights must not all be zero');
    }
    return normalize(explicit);
  }
  if (!accuracies.some((a) => a > 0)) {
    return accuracies.map(() => 1 / accuracies.length);
  }
  return normalize(accuracies);
}

export function weightedMean(values: readonly number[], weights: readonly number[]): number {
  const total = weights.reduce((sum, w) => sum + w, 0);
  let acc = 0;
  values.forEach((v, i) => {
    acc += v * (weights[i] ?? 0);
  });
  return acc / total;
}

export function populationVariance(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  return values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
}

/**
 * Variance of the outputs scaled by the largest variance the output range
 * allows, (max - min)^2 / 4. Result is in [0, 1].
 */
export function normalizedDisagreement(values: readonly number[], range: readonly [number, number]): number {
  const [min, max] = range;
  const maxVariance = ((max - min) ** 2) / 4;
  if (maxVariance <= 0) return 0;
  return clamp(populationVariance(values) / maxVariance, 0, 1);
}

/** Single-model confidence for a predicted margin in points. */
export function marginConfidence(margin: number): number {
  return Math.min(0.95, 0.6 + Math.min(0.3, Math.abs(margin) / 20));
}

export function probabilityConfidence(probability: number): number {
  return Math.max(probability, 1 - probability);
}
