import { z } from "zod";

const FeaturesSchema = z
  .record(z.coerce.number())
  .describe("Feature name to value, e.g. { home_elo: 1600, away_elo: 1500 }");

export const AnalyticsQuerySchema = z.object({
  request_id: z.string().min(1).optional().describe("Caller-supplied request id; generated when absent"),
  user_id: z.string().min(1).describe("Caller identity"),
  query: z.string().describe("The question in plain language"),
  query_type: z
    .string()
    .min(1)
    .describe(
      "One of prediction, ensemble, model_comparison, analysis, statistics, learning, system_status, health, general"
    ),
  parameters: z
    .record(z.unknown())
    .default({})
    .describe("Action parameters: game_key, home_team, away_team, season, week, features, model_id, model_ids, ..."),
  context_hints: z
    .record(z.unknown())
    .default({})
    .describe("Role hints: skill_level, models, fast_path, mode"),
});

export const ListModelsSchema = z.object({});

export const PredictGameSchema = z.object({
  model_id: z.string().min(1).describe("Model id from list_models"),
  features: FeaturesSchema,
});

export const PredictEnsembleSchema = z.object({
  model_ids: z.array(z.string().min(1)).min(1).describe("Models to combine"),
  features: FeaturesSchema,
  weights: z
    .array(z.coerce.number())
    .optional()
    .describe("Explicit weights, one per model; defaults to normalized historical accuracy"),
});
