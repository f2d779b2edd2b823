// BC1: Analytics requests, orchestration states and synthesized responses

import type { PermissionLevel } from './permissions.js';
import type { ContextPriority, Role } from './context.js';
import type { ActionResult } from './agents.js';

export const QUERY_TYPES = [
  'prediction',
  'ensemble',
  'model_comparison',
  'analysis',
  'statistics',
  'learning',
  'system_status',
  'health',
  'general',
] as const;

export type QueryType = typeof QUERY_TYPES[number];

export interface AnalyticsRequest {
  requestId?: string;
  userId: string;
  query: string;
  queryType: string;     // translated into QueryType on ingestion
  parameters?: Record<string, unknown>;
  contextHints?: Record<string, unknown>;
}

export type RequestState =
  | 'received'
  | 'role_detected'
  | 'agents_selected'
  | 'executing'
  | 'synthesizing'
  | 'completed'
  | 'failed';

export type ResponseStatus = 'success' | 'error';

/** What survived the role's token budget. */
export interface ContextSummary {
  budgetTokens: number;
  usedTokens: number;
  sections: Array<{ priority: ContextPriority; label: string }>;
  dropped: Record<ContextPriority, number>;
}

export interface AnalyticsResponse {
  requestId: string;
  status: ResponseStatus;
  queryType?: QueryType;
  role?: Role;
  budgetFraction?: number;
  context?: ContextSummary;
  results: Record<string, ActionResult>;
  insights: string[];
  executionTimeMs: number;
  agentTimings: Record<string, number>;
  trace: RequestState[];
  errorMessage?: string;
}

export interface ProcessOptions {
  /** Set by the trusted host; request hints can never raise it. */
  grantedPermission?: PermissionLevel;
  signal?: AbortSignal;
}
