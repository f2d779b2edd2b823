// Feature table lookup keyed by a deterministic game key

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { FeatureMap } from '../types/models.js';
import { ConfigError, errorMessage, formatZodError } from '../utils/errors.js';

export interface GameRef {
  season: number;
  week: number;
  homeTeam: string;
  awayTeam: string;
}

export interface FeatureRow extends GameRef {
  readonly key: string;
  readonly features: FeatureMap;
}

export interface FeatureRowFilter {
  season?: number;
  week?: number;
  team?: string;
}

export interface FeatureStore {
  lookup(gameKey: string): FeatureRow | undefined;
  rows(filter?: FeatureRowFilter): readonly FeatureRow[];
}

function slug(team: string): string {
  return team.trim().toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
}

export function gameKey(game: GameRef): string {
  return `${game.season}-${game.week}-${slug(game.homeTeam)}-${slug(game.awayTeam)}`;
}

export class InMemoryFeatureStore implements FeatureStore {
  private byKey = new Map<string, FeatureRow>();

  constructor(rows: ReadonlyArray<GameRef & { features: FeatureMap }>) {
    for (const row of rows) {
      const key = gameKey(row);
      if (this.byKey.has(key)) {
        throw new ConfigError(`Duplicate feature row for game ${key}`, { key });
      }
      this.byKey.set(key, { ...row, key });
    }
  }

  lookup(key: string): FeatureRow | undefined {
    return this.byKey.get(key);
  }

  rows(filter: FeatureRowFilter = {}): readonly FeatureRow[] {
    const team = filter.team === undefined ? undefined : slug(filter.team);
    return [...this.byKey.values()].filter((row) =>
      (filter.season === undefined || row.season === filter.season) &&
      (filter.week === undefined || row.week === filter.week) &&
      (team === undefined || slug(row.homeTeam) === team || slug(row.awayTeam) === team),
    );
  }

  get size(): number {
    return this.byKey.size;
  }
}

const featureTableSchema = z.array(z.object({
  season: z.number().int(),
  week: z.number().int().min(0),
  home_team: z.string().min(1),
  away_team: z.string().min(1),
  features: z.record(z.number()),
}));

/** Load a JSON feature table: `[{ season, week, home_team, away_team, features }]`. */
export async function loadFeatureTable(path: string): Promise<InMemoryFeatureStore> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Cannot read feature table ${path}: ${errorMessage(err)}`, { path });
  }
  const parsed = featureTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid feature table ${path}: ${formatZodError(parsed.error)}`, { path });
  }
  return new InMemoryFeatureStore(parsed.data.map((row) => ({
    season: row.season,
    week: row.week,
    homeTeam: row.home_team,
    awayTeam: row.away_team,
    features: row.features,
  })));
}
