// Resolve the feature map an action runs on: explicit features or a feature-table row

import type { FeatureMap } from '../types/models.js';
import { gameKey, type FeatureStore, type GameRef } from '../models/feature-store.js';
import { DataNotFoundError, InvalidParametersError } from '../utils/errors.js';
import type { GameSelector } from './params.js';

export interface ResolvedGame {
  source: 'parameters' | 'feature_table';
  gameKey?: string;
  game?: GameRef;
  features: FeatureMap;
}

export function resolveGame(selector: GameSelector, store: FeatureStore): ResolvedGame {
  if (selector.features) {
    return { source: 'parameters', features: selector.features };
  }

  const { home_team, away_team, season, week } = selector;
  const key = selector.game_key ??
    (home_team !== undefined && away_team !== undefined && season !== undefined && week !== undefined
      ? gameKey({ season, week, homeTeam: home_team, awayTeam: away_team })
      : undefined);
  if (key === undefined) {
    throw new InvalidParametersError(
      'Provide features, a game_key, or home_team, away_team, season and week',
    );
  }

  const row = store.lookup(key);
  if (!row) {
    throw new DataNotFoundError(`No feature row for game ${key}`, { gameKey: key });
  }
  return {
    source: 'feature_table',
    gameKey: key,
    game: { season: row.season, week: row.week, homeTeam: row.homeTeam, awayTeam: row.awayTeam },
    features: row.features,
  };
}

/** Fill the named features with zero where absent; reports what was filled. */
export function imputeZero(
  features: FeatureMap,
  required: readonly string[],
): { features: FeatureMap; imputed: string[] } {
  const imputed = required.filter((name) => {
    const value = features[name];
    return value === undefined || !Number.isFinite(value);
  });
  if (imputed.length === 0) return { features, imputed };
  const filled: Record<string, number> = { ...features };
  for (const name of imputed) filled[name] = 0;
  return { features: filled, imputed };
}

export function formatSigned(value: number, digits = 1): string {
  const fixed = value.toFixed(digits);
  return value > 0 ? `+${fixed}` : fixed;
}

export function formatPercent(probability: number): string {
  return `${(probability * 100).toFixed(1)}%`;
}
