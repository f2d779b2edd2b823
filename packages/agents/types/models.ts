// Model catalog, artifact handles and prediction shapes

export type ModelTask = 'margin' | 'win_probability';

export type FeatureMap = Readonly<Record<string, number>>;

export interface ModelDescriptor {
  readonly id: string;
  readonly task: ModelTask;
  readonly artifact: string;             // file name under the model directory
  readonly requiredFeatures: readonly string[];
  readonly historicalAccuracy: number;   // 0-1
  readonly accuracyHistory?: readonly number[];  // oldest first
  readonly version: string;
  readonly description: string;
}

export interface ModelSummary {
  readonly id: string;
  readonly task: ModelTask;
  readonly requiredFeatures: readonly string[];
  readonly historicalAccuracy: number;
  readonly version: string;
  readonly description: string;
}

/** A deserialized artifact. Shared read-only once loaded. */
export interface ModelHandle {
  readonly modelId: string;
  readonly version: string;
  predict(features: FeatureMap): number;
  dispose?(): void;
}

export interface ModelLoader {
  load(descriptor: ModelDescriptor): Promise<ModelHandle>;
}

export interface PredictionResult {
  readonly modelId: string;
  readonly task: ModelTask;
  readonly version: string;
  readonly value: number;        // margin in points, or home win probability
  readonly confidence: number;
  readonly overflow: boolean;
}

export interface EnsembleResult {
  readonly modelIds: readonly string[];
  readonly weights: Readonly<Record<string, number>>;
  readonly predictions: readonly PredictionResult[];
  readonly margin?: number;
  readonly winProbability?: number;
  readonly disagreement: Readonly<Partial<Record<ModelTask, number>>>;
  readonly confidence: number;
  readonly overflow: boolean;
}
