import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { InMemoryFeatureStore, gameKey, loadFeatureTable } from '../models/feature-store.js';
import { ConfigError } from '../utils/errors.js';
import { TEST_ROWS } from './helpers.js';

describe('gameKey', () => {
  it('builds a lowercase key from season, week and teams', () => {
    expect(gameKey({ season: 2024, week: 5, homeTeam: 'KC', awayTeam: 'BUF' })).toBe('2024-5-kc-buf');
    expect(gameKey({ season: 2023, week: 18, homeTeam: ' San Francisco 49ers ', awayTeam: 'LA Rams' }))
      .toBe('2023-18-san-francisco-49ers-la-rams');
  });
});

describe('InMemoryFeatureStore', () => {
  const store = new InMemoryFeatureStore(TEST_ROWS);

  it('looks rows up by game key', () => {
    expect(store.lookup('2024-5-kc-buf')?.features.home_elo).toBe(1600);
    expect(store.lookup('2024-5-kc-dal')).toBeUndefined();
  });

  it('filters rows by season, week and team', () => {
    expect(store.rows({ season: 2024, week: 5 }).map((r) => r.key)).toEqual(['2024-5-kc-buf', '2024-5-phi-dal']);
    expect(store.rows({ team: 'buf' }).map((r) => r.key)).toEqual(['2024-5-kc-buf', '2024-6-buf-mia']);
    expect(store.rows()).toHaveLength(3);
  });

  it('rejects two rows for the same game', () => {
    const first = TEST_ROWS[0];
    if (!first) throw new Error('fixture missing');
    expect(() => new InMemoryFeatureStore([first, first])).toThrow(ConfigError);
  });
});

describe('loadFeatureTable', () => {
  it('reads the bundled feature table', async () => {
    const store = await loadFeatureTable(fileURLToPath(new URL('../data/features.json', import.meta.url)));
    expect(store.size).toBe(6);
    expect(store.lookup('2024-5-kc-buf')?.features.spread_line).toBe(3.5);
  });

  it('fails on a missing file', async () => {
    await expect(loadFeatureTable('/nonexistent/features.json')).rejects.toBeInstanceOf(ConfigError);
  });
});
