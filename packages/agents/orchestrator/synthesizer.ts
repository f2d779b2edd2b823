// Merge per-agent results into one status and an ordered insight list

import type { ActionResult } from '../types/agents.js';
import type { ResponseStatus } from '../types/analysis.js';
import type { RouteStep } from '../config/routing-table.js';

/** `error` only when every selected agent failed. */
export function overallStatus(results: Readonly<Record<string, ActionResult>>): ResponseStatus {
  const all = Object.values(results);
  if (all.length === 0) return 'error';
  return all.some((r) => r.status === 'success') ? 'success' : 'error';
}

export function synthesizeInsights(
  steps: readonly RouteStep[],
  results: Readonly<Record<string, ActionResult>>,
): string[] {
  const insights: string[] = [];
  const notes: string[] = [];
  for (const step of steps) {
    const result = results[step.agentId];
    if (!result) continue;
    if (result.status === 'success') {
      insights.push(...result.insights);
    } else {
      notes.push(`Note: ${step.agentId} could not complete ${step.action} (${result.error.code}): ${result.error.message}`);
    }
  }
  return [...insights, ...notes];
}
