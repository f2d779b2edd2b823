export { ModelExecutionEngine } from './execution-engine.js';
export type { ExecutionEngineConfig } from './execution-engine.js';
export { ModelRegistry } from './model-registry.js';
export type { RegistryStats, UnavailableModel, ModelRegistryOptions } from './model-registry.js';
export { JsonModelLoader, compileArtifact, sigmoid } from './json-model-loader.js';
export type { ModelArtifact } from './json-model-loader.js';
export { loadModelCatalog, parseModelCatalog, CATALOG_FILE } from './model-catalog.js';
export { InMemoryFeatureStore, loadFeatureTable, gameKey } from './feature-store.js';
export type { FeatureStore, FeatureRow, FeatureRowFilter, GameRef } from './feature-store.js';
export {
  resolveWeights, effectiveAccuracy, normalizedDisagreement, populationVariance, weightedMean,
  marginConfidence, probabilityConfidence,
} from './ensemble.js';
