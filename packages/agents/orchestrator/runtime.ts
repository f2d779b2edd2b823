// Wires settings, model serving, agents and the orchestrator into one runtime

import type { AgentDependencies } from '../types/agents.js';
import type { ModelDescriptor, ModelLoader } from '../types/models.js';
import { SimpleEventBus, type EventBus } from '../types/events.js';
import { getSettings, type Settings } from '../config/settings.js';
import { DEFAULT_INSTANCE_IDS, ROUTING_TABLE, type RoutingTable } from '../config/routing-table.js';
import { ModelExecutionEngine } from '../models/execution-engine.js';
import { ModelRegistry } from '../models/model-registry.js';
import { JsonModelLoader } from '../models/json-model-loader.js';
import { loadModelCatalog } from '../models/model-catalog.js';
import { loadFeatureTable, type FeatureStore } from '../models/feature-store.js';
import { ContentCatalog } from '../content/content-catalog.js';
import { AgentFactory, registerDefaultAgents } from './agent-factory.js';
import { AnalyticsOrchestrator } from './coordinator.js';
import { AtomicMetricsSink, type MetricsSink } from './metrics.js';
import { createLogger } from '../utils/logger.js';

export interface RuntimeOptions {
  settings?: Settings;
  catalog?: readonly ModelDescriptor[];
  loader?: ModelLoader;
  featureStore?: FeatureStore;
  content?: ContentCatalog;
  metrics?: MetricsSink;
  eventBus?: EventBus;
  routes?: RoutingTable;
}

export interface AnalyticsRuntime {
  settings: Settings;
  orchestrator: AnalyticsOrchestrator;
  engine: ModelExecutionEngine;
  registry: ModelRegistry;
  factory: AgentFactory;
  metrics: MetricsSink;
  eventBus: EventBus;
  shutdown(): void;
}

const log = createLogger('runtime');

/**
 * Build a runtime from settings. Anything passed in options replaces the
 * file-backed default.
 */
export async function createAnalyticsRuntime(options: RuntimeOptions = {}): Promise<AnalyticsRuntime> {
  const settings = options.settings ?? getSettings();
  const eventBus = options.eventBus ?? new SimpleEventBus();
  const metrics = options.metrics ?? new AtomicMetricsSink();

  const [catalog, featureStore, content] = await Promise.all([
    options.catalog ?? loadModelCatalog(settings.paths.modelDir),
    options.featureStore ?? loadFeatureTable(settings.paths.featureTable),
    options.content ?? ContentCatalog.load(settings.paths.contentFile),
  ]);

  const registry = new ModelRegistry(options.loader ?? new JsonModelLoader(settings.paths.modelDir), { eventBus });
  const engine = new ModelExecutionEngine({
    catalog,
    registry,
    accuracyWindow: settings.ensemble.accuracyWindow,
    marginRange: settings.ensemble.marginRange,
    lowConfidence: settings.ensemble.lowConfidence,
  });

  const deps: AgentDependencies = { engine, registry, featureStore, content, metrics, eventBus };
  const factory = new AgentFactory(deps);
  registerDefaultAgents(factory);
  for (const [typeName, instanceId] of Object.entries(DEFAULT_INSTANCE_IDS)) {
    factory.create(typeName, instanceId);
  }

  const orchestrator = new AnalyticsOrchestrator({
    factory,
    routes: options.routes ?? ROUTING_TABLE,
    contextSources: content.contextSources(),
    metrics,
    agentTimeoutMs: settings.orchestrator.agentTimeoutMs,
    baseTokenBudget: settings.orchestrator.baseTokenBudget,
    eventBus,
  });

  log.info({ models: catalog.length, agents: factory.list().length }, 'Analytics runtime ready');

  return {
    settings,
    orchestrator,
    engine,
    registry,
    factory,
    metrics,
    eventBus,
    shutdown() {
      factory.shutdown();
      registry.close();
    },
  };
}
