// Context Manager: role detection and token-budgeted context assembly.
// Everything here is pure: same request and sources, same result.

import type {
  AssembledContext, BuiltContext, ContextPriority, ContextSection, ContextSources, Role, RoleProfile,
} from '../types/context.js';
import type { AnalyticsRequest } from '../types/analysis.js';

export const ROLE_BUDGETS: Readonly<Record<Role, number>> = {
  analyst: 0.5,
  data_scientist: 0.75,
  production: 0.25,
};

export const DEFAULT_BASE_TOKEN_BUDGET = 100_000;
export const CHARS_PER_TOKEN = 4;

export const EMPTY_SOURCES: ContextSources = { explanations: {}, history: [] };

type Hints = Readonly<Record<string, unknown>>;

function hasModels(hints: Hints): boolean {
  const models = hints.models;
  if (Array.isArray(models)) return models.length > 0;
  return typeof models === 'string' && models.trim() !== '';
}

function isProductionMarker(hints: Hints): boolean {
  return hints.fast_path === true ||
    hints.mode === 'production' ||
    hints.role === 'production' ||
    hints.environment === 'production';
}

// Evaluated in order; the first match wins
const ROLE_RULES: ReadonlyArray<{ role: Role; matches: (hints: Hints) => boolean }> = [
  { role: 'data_scientist', matches: (h) => hasModels(h) && h.skill_level === 'advanced' },
  { role: 'production', matches: isProductionMarker },
];

export function detectRole(hints: Hints = {}): RoleProfile {
  const rule = ROLE_RULES.find((r) => r.matches(hints));
  const role: Role = rule ? rule.role : 'analyst';
  return { role, budgetFraction: ROLE_BUDGETS[role] };
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

const ENTITY_KEYS = [
  'game_key', 'home_team', 'away_team', 'season', 'week',
  'model_id', 'model_ids', 'feature', 'topic', 'concepts',
] as const;

function describeValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() === '' ? undefined : value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) {
    const parts = value.filter((v) => typeof v === 'string' || typeof v === 'number').map(String);
    return parts.length > 0 ? parts.join(', ') : undefined;
  }
  return undefined;
}

/** Entities the caller asked about directly, in a fixed key order. */
export function collectEntities(request: Pick<AnalyticsRequest, 'parameters' | 'contextHints'>): ContextSection[] {
  const params = request.parameters ?? {};
  const sections: ContextSection[] = [];
  for (const key of ENTITY_KEYS) {
    const text = describeValue(params[key]);
    if (text !== undefined) {
      sections.push({ priority: 'entities', label: key, text: `${key}: ${text}` });
    }
  }
  const features = params.features;
  if (features && typeof features === 'object' && !Array.isArray(features)) {
    const names = Object.keys(features);
    if (names.length > 0) {
      sections.push({ priority: 'entities', label: 'features', text: `features: ${names.join(', ')}` });
    }
  }
  const models = describeValue(request.contextHints?.models);
  if (models !== undefined) {
    sections.push({ priority: 'entities', label: 'models', text: `models: ${models}` });
  }
  return sections;
}

const DROP_ORDER: readonly ContextPriority[] = ['historical', 'explanatory', 'entities'];

/**
 * Fit sections into the budget by dropping whole sections, lowest priority
 * first and from the end of each priority group.
 */
export function assembleContext(sections: readonly ContextSection[], budgetTokens: number): AssembledContext {
  const kept = [...sections];
  const dropped: Record<ContextPriority, number> = { entities: 0, explanatory: 0, historical: 0 };
  let used = kept.reduce((sum, s) => sum + estimateTokens(s.text), 0);

  for (const priority of DROP_ORDER) {
    for (let i = kept.length - 1; i >= 0 && used > budgetTokens; i--) {
      const section = kept[i];
      if (section && section.priority === priority) {
        used -= estimateTokens(section.text);
        kept.splice(i, 1);
        dropped[priority]++;
      }
    }
  }
  return { sections: kept, usedTokens: used, budgetTokens, dropped };
}

export interface BuildContextOptions {
  baseTokenBudget?: number;
}

export function buildContext(
  request: Pick<AnalyticsRequest, 'parameters' | 'contextHints'>,
  sources: ContextSources = EMPTY_SOURCES,
  options: BuildContextOptions = {},
): BuiltContext {
  const profile = detectRole(request.contextHints ?? {});
  const budgetTokens = Math.floor((options.baseTokenBudget ?? DEFAULT_BASE_TOKEN_BUDGET) * profile.budgetFraction);

  const explanatory: ContextSection[] = (sources.explanations[profile.role] ?? []).map((text, i) => ({
    priority: 'explanatory',
    label: `note-${i + 1}`,
    text,
  }));
  const historical: ContextSection[] = sources.history.map((text, i) => ({
    priority: 'historical',
    label: `history-${i + 1}`,
    text,
  }));

  const context = assembleContext(
    [...collectEntities(request), ...explanatory, ...historical],
    budgetTokens,
  );
  return { ...profile, budgetTokens, context };
}
