import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { JsonModelLoader, compileArtifact, sigmoid } from '../models/json-model-loader.js';
import { loadModelCatalog, parseModelCatalog } from '../models/model-catalog.js';
import { ConfigError, ModelLoadFailureError, ModelNotFoundError } from '../utils/errors.js';
import type { ModelDescriptor } from '../types/models.js';
import { GAME_FEATURES, descriptor } from './helpers.js';

const MODEL_PACK = fileURLToPath(new URL('../model-pack', import.meta.url));

describe('bundled model pack', () => {
  let catalog: ModelDescriptor[];
  const loader = new JsonModelLoader(MODEL_PACK);

  beforeAll(async () => {
    catalog = await loadModelCatalog(MODEL_PACK);
  });

  function entry(id: string): ModelDescriptor {
    const found = catalog.find((d) => d.id === id);
    if (!found) throw new Error(`missing catalog entry ${id}`);
    return found;
  }

  it('declares four models', () => {
    expect(catalog.map((d) => d.id)).toEqual([
      'ridge_model_2025',
      'xgb_home_win_model_2025',
      'logistic_home_win_model_2025',
      'random_forest_margin_2025',
    ]);
  });

  it('scores the linear margin model', async () => {
    const handle = await loader.load(entry('ridge_model_2025'));
    expect(handle.version).toBe('2025.1');
    expect(handle.predict(GAME_FEATURES)).toBeCloseTo(7.25, 10);
  });

  it('scores the boosted stumps through a sigmoid', async () => {
    const handle = await loader.load(entry('xgb_home_win_model_2025'));
    expect(handle.predict(GAME_FEATURES)).toBeCloseTo(sigmoid(0.75), 10);
  });

  it('scores the logistic model', async () => {
    const handle = await loader.load(entry('logistic_home_win_model_2025'));
    expect(handle.predict(GAME_FEATURES)).toBeCloseTo(sigmoid(0.6), 10);
  });

  it('scores the raw stump ensemble', async () => {
    const handle = await loader.load(entry('random_forest_margin_2025'));
    expect(handle.predict(GAME_FEATURES)).toBe(8);
  });
});

describe('compileArtifact', () => {
  it('sends values at the threshold down the left branch', () => {
    const score = compileArtifact({
      kind: 'stump_ensemble',
      modelId: 'm',
      version: '1',
      base: 0,
      learningRate: 0.5,
      output: 'raw',
      stumps: [{ feature: 'x', threshold: 1, left: -2, right: 2 }],
    });
    expect(score({ x: 1 })).toBe(-1);
    expect(score({ x: 1.5 })).toBe(1);
  });
});

describe('JsonModelLoader failures', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'model-pack-'));
    await writeFile(join(dir, 'garbled.json'), '{ not json');
    await writeFile(join(dir, 'wrong-kind.json'), JSON.stringify({ kind: 'neural', modelId: 'wrong-kind', version: '1' }));
    await writeFile(join(dir, 'other.json'), JSON.stringify({
      kind: 'linear', modelId: 'someone-else', version: '1', intercept: 0, coefficients: { x: 1 },
    }));
    await writeFile(join(dir, 'sneaky.json'), JSON.stringify({
      kind: 'linear', modelId: 'sneaky', version: '1', intercept: 0, coefficients: { x: 1, y: 2 },
    }));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports a missing artifact as not found', async () => {
    const loader = new JsonModelLoader(dir);
    await expect(loader.load(descriptor('absent', 'margin', ['x'], 0.5))).rejects.toBeInstanceOf(ModelNotFoundError);
  });

  it('reports unreadable artifacts as load failures', async () => {
    const loader = new JsonModelLoader(dir);
    await expect(loader.load(descriptor('garbled', 'margin', ['x'], 0.5))).rejects.toBeInstanceOf(ModelLoadFailureError);
    await expect(loader.load(descriptor('wrong-kind', 'margin', ['x'], 0.5))).rejects.toBeInstanceOf(ModelLoadFailureError);
  });

  it('rejects an artifact written for another model', async () => {
    const loader = new JsonModelLoader(dir);
    await expect(loader.load(descriptor('other', 'margin', ['x'], 0.5, { artifact: 'other.json' })))
      .rejects.toThrow("Model 'other' failed to load: artifact belongs to 'someone-else'");
  });

  it('rejects an artifact that reads undeclared features', async () => {
    const loader = new JsonModelLoader(dir);
    await expect(loader.load(descriptor('sneaky', 'margin', ['x'], 0.5)))
      .rejects.toThrow("Model 'sneaky' failed to load: artifact reads undeclared features: y");
  });
});

describe('parseModelCatalog', () => {
  const model = {
    id: 'a', task: 'margin', artifact: 'a.json', requiredFeatures: ['x'], historicalAccuracy: 0.5, version: '1',
  };

  it('fills in an empty description', () => {
    expect(parseModelCatalog({ models: [model] })[0]?.description).toBe('');
  });

  it('rejects duplicate ids and bad entries', () => {
    expect(() => parseModelCatalog({ models: [model, model] })).toThrow("Model 'a' is declared twice in catalog");
    expect(() => parseModelCatalog({ models: [{ ...model, historicalAccuracy: 2 }] })).toThrow(ConfigError);
  });
});
