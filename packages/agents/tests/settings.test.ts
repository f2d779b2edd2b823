import { describe, it, expect, afterEach } from 'vitest';
import { getSettings, loadSettings, resetSettings } from '../config/settings.js';
import { ConfigError } from '../utils/errors.js';

describe('loadSettings', () => {
  afterEach(() => {
    resetSettings();
  });

  it('applies defaults for an empty environment', () => {
    const settings = loadSettings({});
    expect(settings.orchestrator).toEqual({ agentTimeoutMs: 5000, baseTokenBudget: 100_000 });
    expect(settings.ensemble).toEqual({ accuracyWindow: undefined, marginRange: 70, lowConfidence: 0.1 });
    expect(settings.paths.modelDir.endsWith('model-pack')).toBe(true);
    expect(settings.paths.featureTable.endsWith('features.json')).toBe(true);
  });

  it('reads overrides and treats blank values as unset', () => {
    const settings = loadSettings({
      AGENT_TIMEOUT_MS: '250',
      ACCURACY_WINDOW: '3',
      MARGIN_RANGE: '',
      PLAYCALLER_MODEL_DIR: '/srv/models',
    });
    expect(settings.orchestrator.agentTimeoutMs).toBe(250);
    expect(settings.ensemble.accuracyWindow).toBe(3);
    expect(settings.ensemble.marginRange).toBe(70);
    expect(settings.paths.modelDir).toBe('/srv/models');
  });

  it('rejects invalid values', () => {
    expect(() => loadSettings({ AGENT_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
    expect(() => loadSettings({ LOW_CONFIDENCE: '2' })).toThrow(/^Invalid environment: LOW_CONFIDENCE/);
  });

  it('memoizes process settings until reset', () => {
    const first = getSettings();
    expect(getSettings()).toBe(first);
    resetSettings();
    expect(getSettings()).not.toBe(first);
  });
});
