// Parameter schemas for agent actions (snake_case, as sent by callers)

import { z } from 'zod';
import { SKILL_LEVELS } from '../content/content-catalog.js';

const intParam = z.coerce.number().int();

export const gameSelectorSchema = z.object({
  features: z.record(z.number()).optional(),
  game_key: z.string().min(1).optional(),
  home_team: z.string().min(1).optional(),
  away_team: z.string().min(1).optional(),
  season: intParam.optional(),
  week: intParam.optional(),
  /** Explicit caller-side imputation; without it missing features fail */
  impute: z.enum(['zero']).optional(),
});

export type GameSelector = z.infer<typeof gameSelectorSchema>;

export const predictParamsSchema = gameSelectorSchema.extend({
  model_id: z.string().min(1).optional(),
});

export const ensembleParamsSchema = gameSelectorSchema.extend({
  model_ids: z.array(z.string().min(1)).min(1).optional(),
  weights: z.array(z.number()).optional(),
});

export const comparisonParamsSchema = gameSelectorSchema.extend({
  model_ids: z.array(z.string().min(1)).min(1).optional(),
});

export const statisticsParamsSchema = z.object({
  feature: z.string().min(1),
  season: intParam.optional(),
  week: intParam.optional(),
  team: z.string().min(1).optional(),
});

export const learningParamsSchema = z.object({
  topic: z.string().min(1).optional(),
  skill_level: z.enum(SKILL_LEVELS).optional(),
  concepts: z.array(z.string().min(1)).optional(),
  limit: intParam.min(1).max(20).default(3),
});
