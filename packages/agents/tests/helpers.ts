// Shared fixtures for agent, engine and orchestrator tests

import type { AgentDependencies, CallerContext } from '../types/agents.js';
import type {
  FeatureMap, ModelDescriptor, ModelHandle, ModelLoader, ModelTask,
} from '../types/models.js';
import { SimpleEventBus } from '../types/events.js';
import { ModelExecutionEngine } from '../models/execution-engine.js';
import { ModelRegistry } from '../models/model-registry.js';
import { InMemoryFeatureStore } from '../models/feature-store.js';
import { ContentCatalog, type ContentData } from '../content/content-catalog.js';
import { InMemoryMetricsRecorder } from '../orchestrator/metrics.js';
import { AgentFactory, registerDefaultAgents } from '../orchestrator/agent-factory.js';
import { DEFAULT_INSTANCE_IDS } from '../config/routing-table.js';
import { ModelNotFoundError } from '../utils/errors.js';

export const GAME_FEATURES: FeatureMap = {
  home_elo: 1600,
  away_elo: 1500,
  home_epa_per_play: 0.1,
  away_epa_per_play: 0.05,
  home_rest_days: 7,
  away_rest_days: 6,
  home_success_rate: 0.48,
  away_success_rate: 0.44,
  spread_line: 3.5,
};

export const TEST_ROWS = [
  { season: 2024, week: 5, homeTeam: 'KC', awayTeam: 'BUF', features: GAME_FEATURES },
  { season: 2024, week: 5, homeTeam: 'PHI', awayTeam: 'DAL', features: { home_elo: 1580, away_elo: 1540 } },
  { season: 2024, week: 6, homeTeam: 'BUF', awayTeam: 'MIA', features: { home_elo: 1530, away_elo: 1490 } },
];

// Deterministic pseudo-random sequence for generated cases
export function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
}

export type FakeModel = (features: FeatureMap) => number;

export function descriptor(
  id: string,
  task: ModelTask,
  requiredFeatures: string[],
  historicalAccuracy: number,
  extra: Partial<ModelDescriptor> = {},
): ModelDescriptor {
  return {
    id,
    task,
    artifact: `${id}.json`,
    requiredFeatures,
    historicalAccuracy,
    version: 'test',
    description: `${id} test model`,
    ...extra,
  };
}

// ridge: 10 and xgb: 4 on GAME_FEATURES
export const TEST_CATALOG: ModelDescriptor[] = [
  descriptor('ridge', 'margin', ['home_elo', 'away_elo'], 0.6),
  descriptor('xgb', 'margin', ['home_elo'], 0.4),
];

export const TEST_MODELS: Record<string, FakeModel> = {
  ridge: (f) => ((f.home_elo ?? 0) - (f.away_elo ?? 0)) / 10,
  xgb: (f) => (f.home_elo ?? 0) / 400,
};

/** Serves in-memory models; unknown ids fail like a missing artifact. */
export class FakeLoader implements ModelLoader {
  readonly loads: string[] = [];
  readonly disposed: string[] = [];

  constructor(
    private readonly models: Record<string, FakeModel | Error>,
    private readonly delayMs = 0,
  ) {}

  async load(d: ModelDescriptor): Promise<ModelHandle> {
    this.loads.push(d.id);
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    const model = this.models[d.id];
    if (model === undefined) {
      throw new ModelNotFoundError(d.id, 'no fake artifact');
    }
    if (model instanceof Error) throw model;
    return {
      modelId: d.id,
      version: 'test',
      predict: model,
      dispose: () => {
        this.disposed.push(d.id);
      },
    };
  }
}

export const TEST_CONTENT: ContentData = {
  resources: [
    {
      id: 'basics',
      title: 'Basics',
      level: 'beginner',
      topics: ['predictions'],
      roles: ['analyst', 'production'],
      minutes: 10,
      summary: 'Reading predictions.',
    },
    {
      id: 'ensembles',
      title: 'Ensembles',
      level: 'intermediate',
      topics: ['ensemble'],
      roles: ['analyst', 'data_scientist'],
      minutes: 20,
      summary: 'Combining models.',
    },
    {
      id: 'calibration',
      title: 'Calibration',
      level: 'advanced',
      topics: ['probability'],
      roles: ['data_scientist'],
      minutes: 30,
      summary: 'Calibrating probabilities.',
    },
  ],
  concepts: {
    epa: 'Expected points added.',
    ensemble: 'Several models combined.',
  },
  roleNotes: {
    analyst: ['Margins are home minus away.'],
    data_scientist: ['Weights come from accuracy.'],
    production: [],
  },
};

export interface TestDeps extends AgentDependencies {
  loader: FakeLoader;
  metrics: InMemoryMetricsRecorder;
}

export function createTestDeps(options: {
  catalog?: ModelDescriptor[];
  models?: Record<string, FakeModel | Error>;
  accuracyWindow?: number;
} = {}): TestDeps {
  const loader = new FakeLoader(options.models ?? TEST_MODELS);
  const eventBus = new SimpleEventBus();
  const registry = new ModelRegistry(loader, { eventBus });
  const engine = new ModelExecutionEngine({
    catalog: options.catalog ?? TEST_CATALOG,
    registry,
    accuracyWindow: options.accuracyWindow,
  });
  return {
    loader,
    engine,
    registry,
    featureStore: new InMemoryFeatureStore(TEST_ROWS),
    content: new ContentCatalog(TEST_CONTENT),
    metrics: new InMemoryMetricsRecorder(),
    eventBus,
  };
}

/** Factory with every built-in agent created under its default id. */
export function createTestFactory(deps: AgentDependencies): AgentFactory {
  const factory = new AgentFactory(deps);
  registerDefaultAgents(factory);
  for (const [typeName, instanceId] of Object.entries(DEFAULT_INSTANCE_IDS)) {
    factory.create(typeName, instanceId);
  }
  return factory;
}

export function callerContext(overrides: Partial<CallerContext> = {}): CallerContext {
  return {
    requestId: 'req-test',
    userId: 'user-test',
    query: '',
    role: 'analyst',
    permission: 'READ_EXECUTE_WRITE',
    budgetFraction: 0.5,
    context: {
      sections: [],
      usedTokens: 0,
      budgetTokens: 50_000,
      dropped: { entities: 0, explanatory: 0, historical: 0 },
    },
    contextHints: {},
    signal: new AbortController().signal,
    ...overrides,
  };
}
