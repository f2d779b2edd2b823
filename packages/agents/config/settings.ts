// Environment-driven settings, validated once and memoized

import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError, formatZodError } from '../utils/errors.js';

const PACKAGE_ROOT = fileURLToPath(new URL('..', import.meta.url));

const blankAsUnset = (value: unknown): unknown => (value === '' ? undefined : value);

const envSchema = z.object({
  PLAYCALLER_MODEL_DIR: z.preprocess(blankAsUnset, z.string().default(join(PACKAGE_ROOT, 'model-pack'))),
  PLAYCALLER_FEATURE_TABLE: z.preprocess(
    blankAsUnset,
    z.string().default(join(PACKAGE_ROOT, 'data', 'features.json')),
  ),
  PLAYCALLER_CONTENT_FILE: z.preprocess(
    blankAsUnset,
    z.string().default(join(PACKAGE_ROOT, 'data', 'learning-content.json')),
  ),
  AGENT_TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(5000)),
  BASE_TOKEN_BUDGET: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(100_000)),
  ACCURACY_WINDOW: z.preprocess(blankAsUnset, z.coerce.number().int().positive().optional()),
  MARGIN_RANGE: z.preprocess(blankAsUnset, z.coerce.number().positive().default(70)),
  LOW_CONFIDENCE: z.preprocess(blankAsUnset, z.coerce.number().min(0).max(1).default(0.1)),
});

export interface Settings {
  paths: {
    modelDir: string;
    featureTable: string;
    contentFile: string;
  };
  orchestrator: {
    agentTimeoutMs: number;
    baseTokenBudget: number;
  };
  ensemble: {
    /** Mean of the last N accuracy entries replaces the catalog figure when set */
    accuracyWindow?: number;
    marginRange: number;
    lowConfidence: number;
  };
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatZodError(parsed.error)}`);
  }
  const e = parsed.data;
  return {
    paths: {
      modelDir: e.PLAYCALLER_MODEL_DIR,
      featureTable: e.PLAYCALLER_FEATURE_TABLE,
      contentFile: e.PLAYCALLER_CONTENT_FILE,
    },
    orchestrator: {
      agentTimeoutMs: e.AGENT_TIMEOUT_MS,
      baseTokenBudget: e.BASE_TOKEN_BUDGET,
    },
    ensemble: {
      accuracyWindow: e.ACCURACY_WINDOW,
      marginRange: e.MARGIN_RANGE,
      lowConfidence: e.LOW_CONFIDENCE,
    },
  };
}

let cached: Settings | undefined;

export function getSettings(): Settings {
  cached ??= loadSettings();
  return cached;
}

export function resetSettings(): void {
  cached = undefined;
}
