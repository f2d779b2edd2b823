import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AnalyticsRuntime } from "@playcaller/agents";
import {
  AnalyticsQuerySchema,
  ListModelsSchema,
  PredictEnsembleSchema,
  PredictGameSchema,
} from "../schemas/analytics.js";
import { wrapError, wrapResponse, type ToolResponse } from "../formatters/response.js";

export type ToolRuntime = Pick<AnalyticsRuntime, "orchestrator" | "engine">;

export async function handleAnalyticsQuery(runtime: ToolRuntime, params: unknown): Promise<ToolResponse> {
  try {
    const validated = AnalyticsQuerySchema.parse(params);
    const response = await runtime.orchestrator.process({
      requestId: validated.request_id,
      userId: validated.user_id,
      query: validated.query,
      queryType: validated.query_type,
      parameters: validated.parameters,
      contextHints: validated.context_hints,
    });
    return wrapResponse(response, response.status === "error");
  } catch (err) {
    return wrapError(err);
  }
}

export async function handleListModels(runtime: ToolRuntime, params: unknown): Promise<ToolResponse> {
  try {
    ListModelsSchema.parse(params);
    return wrapResponse({ models: runtime.engine.listAvailableModels() });
  } catch (err) {
    return wrapError(err);
  }
}

export async function handlePredictGame(runtime: ToolRuntime, params: unknown): Promise<ToolResponse> {
  try {
    const validated = PredictGameSchema.parse(params);
    return wrapResponse(await runtime.engine.predict(validated.model_id, validated.features));
  } catch (err) {
    return wrapError(err);
  }
}

export async function handlePredictEnsemble(runtime: ToolRuntime, params: unknown): Promise<ToolResponse> {
  try {
    const validated = PredictEnsembleSchema.parse(params);
    return wrapResponse(
      await runtime.engine.predictEnsemble(validated.features, validated.model_ids, validated.weights)
    );
  } catch (err) {
    return wrapError(err);
  }
}

export function registerAnalyticsTools(server: McpServer, runtime: ToolRuntime) {
  server.tool(
    "analytics_query",
    "Route an analytics question to the relevant agents and return one synthesized response: per-agent results (success or a tagged error such as PermissionDenied or Timeout), ordered insights, overall status, detected role and timings.",
    AnalyticsQuerySchema.shape,
    async (params) => handleAnalyticsQuery(runtime, params)
  );

  server.tool(
    "list_models",
    "List the prediction models currently available, with task (margin or win_probability), required features, historical accuracy and version.",
    ListModelsSchema.shape,
    async (params) => handleListModels(runtime, params)
  );

  server.tool(
    "predict_game",
    "Run one model on a feature map. Every required feature must be present; missing features are rejected with FeatureMismatch, never zero-filled.",
    PredictGameSchema.shape,
    async (params) => handlePredictGame(runtime, params)
  );

  server.tool(
    "predict_ensemble",
    "Combine several models into one prediction. Weights default to normalized historical accuracy. Returns combined margin and/or home win probability (clamped to [0.01, 0.99]), per-model outputs, weights and a disagreement-based confidence.",
    PredictEnsembleSchema.shape,
    async (params) => handlePredictEnsemble(runtime, params)
  );
}
