import { ZodError } from "zod";
import { formatZodError, isAnalyticsError } from "@playcaller/agents";

export interface ToolResponse {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: boolean;
}

export function wrapResponse(result: unknown, isError = false): ToolResponse {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

/**
 * Errors become tool results rather than protocol errors, keeping the
 * analytics error code when there is one.
 */
export function wrapError(err: unknown): ToolResponse {
  if (err instanceof ZodError) {
    return wrapResponse({ error: { code: "InvalidParameters", message: formatZodError(err) } }, true);
  }
  if (isAnalyticsError(err)) {
    return wrapResponse({ error: { code: err.code, message: err.message } }, true);
  }
  return wrapResponse({ error: { code: "InternalError", message: err instanceof Error ? err.message : String(err) } }, true);
}
