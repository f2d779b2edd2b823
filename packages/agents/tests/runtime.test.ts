import { describe, it, expect, afterEach } from 'vitest';
import { createAnalyticsRuntime, type AnalyticsRuntime } from '../orchestrator/runtime.js';
import { loadSettings } from '../config/settings.js';
import { AtomicMetricsSink } from '../orchestrator/metrics.js';

describe('createAnalyticsRuntime', () => {
  let runtime: AnalyticsRuntime | undefined;

  afterEach(() => {
    runtime?.shutdown();
    runtime = undefined;
  });

  it('serves an ensemble request from the bundled model pack', async () => {
    runtime = await createAnalyticsRuntime({ settings: loadSettings({}), metrics: new AtomicMetricsSink() });
    const response = await runtime.orchestrator.process({
      userId: 'user-1',
      query: 'Ensemble call for KC vs BUF',
      queryType: 'ensemble',
      parameters: { game_key: '2024-5-kc-buf' },
    });

    expect(response.status).toBe('success');
    expect(response.insights).toEqual([
      'Ensemble margin: +7.6 points across 4 models',
      'Ensemble home win probability: 66.3%',
      'Ensemble confidence: 1.00',
      'KC leads on epa_per_play (0.1 vs 0.05, +50.0%)',
      'KC leads on rest_days (7 vs 6, +14.3%)',
      'KC leads on success_rate (0.48 vs 0.44, +8.3%)',
    ]);
    expect(runtime.registry.stats().loaded).toEqual([
      'logistic_home_win_model_2025',
      'random_forest_margin_2025',
      'ridge_model_2025',
      'xgb_home_win_model_2025',
    ]);
  });

  it('computes the accuracy-weighted ensemble values', async () => {
    runtime = await createAnalyticsRuntime({ settings: loadSettings({}) });
    const features = {
      home_elo: 1600, away_elo: 1500, home_epa_per_play: 0.1, away_epa_per_play: 0.05,
      home_rest_days: 7, away_rest_days: 6, home_success_rate: 0.48, away_success_rate: 0.44, spread_line: 3.5,
    };
    const result = await runtime.engine.predictEnsemble(features, runtime.engine.catalogIds());

    expect(result.margin).toBeCloseTo(7.616, 6);
    expect(result.winProbability).toBeCloseTo(0.6628073, 6);
    expect(result.weights.ridge_model_2025).toBeCloseTo(0.64 / 2.54, 10);
    expect(result.confidence).toBeGreaterThan(0.998);
    expect(result.confidence).toBeLessThan(0.999);
  });

  it('answers learning questions from the bundled content', async () => {
    runtime = await createAnalyticsRuntime({ settings: loadSettings({}) });
    const response = await runtime.orchestrator.process({
      userId: 'user-1',
      query: 'What is EPA?',
      queryType: 'analysis',
      parameters: { game_key: '2024-5-kc-buf' },
    });
    expect(response.status).toBe('success');
    expect(response.results.learning_navigator?.status).toBe('success');
    expect(response.insights).toContain('epa: Expected points added: the change in expected points from one play to the next.');
  });

  it('builds context from the bundled role notes and background history', async () => {
    runtime = await createAnalyticsRuntime({ settings: loadSettings({}) });
    const response = await runtime.orchestrator.process({
      userId: 'user-1',
      query: 'Who wins KC vs BUF?',
      queryType: 'prediction',
      parameters: { game_key: '2024-5-kc-buf' },
    });

    expect(response.context?.budgetTokens).toBe(50_000);
    expect(response.context?.sections.map((s) => `${s.priority}:${s.label}`)).toEqual([
      'entities:game_key',
      'explanatory:note-1',
      'explanatory:note-2',
      'historical:history-1',
      'historical:history-2',
      'historical:history-3',
    ]);
    expect(response.context?.dropped).toEqual({ entities: 0, explanatory: 0, historical: 0 });
  });
});

