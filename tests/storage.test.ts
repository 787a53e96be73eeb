import { describe, it, expect, afterAll } from 'vitest';
import pkg from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import * as schema from '@shared/schema';
import {
  DatabaseStorage,
  countWrites,
  existingKeysQuery,
  latestByKey,
  listingKey,
  upsertStatement,
} from '../server/storage';
import { PersistenceError } from '../server/errors';
import { makeCandidate, makeRecord } from './fixtures';

describe('listingKey', () => {
  it('prefers the external id', () => {
    expect(listingKey({ external_id: '77', url: 'https://l.test/77' })).toBe('77');
  });

  it('falls back to the url', () => {
    expect(listingKey({ external_id: null, url: 'https://l.test/77' })).toBe('https://l.test/77');
    expect(listingKey({ external_id: '', url: 'https://l.test/77' })).toBe('https://l.test/77');
  });
});

describe('latestByKey', () => {
  it('keeps the latest scrape per key', () => {
    const older = makeRecord({ title: 'old', scraped_at: new Date('2025-01-01T00:00:00Z') });
    const newer = makeRecord({ title: 'new', scraped_at: new Date('2025-01-02T00:00:00Z') });

    expect(latestByKey([newer, older]).map(r => r.title)).toEqual(['new']);
    expect(latestByKey([older, newer]).map(r => r.title)).toEqual(['new']);
  });

  it('stamps the listing key', () => {
    const record = { ...makeRecord({ external_id: null, url: 'https://l.test/no-id' }), listing_key: '' };

    expect(latestByKey([record])[0]?.listing_key).toBe('https://l.test/no-id');
  });

  it('keeps distinct listings apart', () => {
    const a = makeRecord({ external_id: 'a', url: 'https://l.test/a' });
    const b = makeRecord({ external_id: 'b', url: 'https://l.test/b' });

    expect(latestByKey([a, b])).toHaveLength(2);
  });
});

describe('DatabaseStorage.upsertListings', () => {
  it('does not touch the database for an empty batch', async () => {
    const store = new DatabaseStorage(() => { throw new Error('no database in tests'); });

    expect(await store.upsertListings([])).toEqual({ inserted: 0, modified: 0, total: 0 });
  });

  it('rejects invalid records as a persistence failure', async () => {
    const store = new DatabaseStorage(() => { throw new Error('no database in tests'); });

    await expect(store.upsertListings([makeRecord({ url: 'not a url' })])).rejects.toBeInstanceOf(PersistenceError);
  });

  it('reports an unreachable database as a persistence failure', async () => {
    const store = new DatabaseStorage(() => { throw new Error('connection refused'); });

    await expect(store.upsertListings([makeRecord()])).rejects.toThrow('Batched upsert of 1 listings failed');
  });
});

// Statements are only compiled here; the pool never opens a connection.
const pool = new pkg.Pool();
const db = drizzle(pool, { schema });

afterAll(async () => {
  await pool.end();
});

describe('upsertStatement', () => {
  const rows = [
    makeRecord(),
    makeRecord({ external_id: 'b', url: 'https://l.test/b' }),
  ].map(record => schema.insertListingSchema.parse(record));

  it('upserts on the listing key', () => {
    const { sql } = upsertStatement(db, rows).toSQL();

    expect(sql).toContain('on conflict ("listing_key") do update set');
    expect(sql).toContain('"scraped_at" = excluded.scraped_at');
    expect(sql).toContain('"title" = excluded.title');
  });

  it('only overwrites a row with an equal or newer scrape', () => {
    const { sql } = upsertStatement(db, rows).toSQL();

    expect(sql).toMatch(/do update set .* where ("listings"\.)?"scraped_at" <= excluded\.scraped_at/);
  });

  it('returns the key and whether the row was inserted', () => {
    const { sql } = upsertStatement(db, rows).toSQL();

    expect(sql).toContain('returning "listing_key", (xmax = 0)');
  });

  it('writes the whole batch in one statement', () => {
    const { sql, params } = upsertStatement(db, rows).toSQL();

    expect(sql.match(/insert into/g)).toHaveLength(1);
    expect(sql).toContain('$34');
    expect(sql).not.toContain('$35');
    expect(params).toContain('123');
    expect(params).toContain('https://l.test/b');
  });
});

describe('countWrites', () => {
  it('splits returned rows into inserted and modified', () => {
    expect(countWrites([{ inserted: true }, { inserted: false }, { inserted: true }]))
      .toEqual({ inserted: 2, modified: 1, total: 3 });
  });

  it('counts nothing when every row was older than the stored one', () => {
    expect(countWrites([])).toEqual({ inserted: 0, modified: 0, total: 0 });
  });
});

describe('existingKeysQuery', () => {
  it('looks up ids and urls in one query', () => {
    const candidates = [
      makeCandidate(),
      makeCandidate({ external_id: '456', url: 'https://l.test/456' }),
      makeCandidate({ external_id: '', url: 'https://l.test/789' }),
      makeCandidate(),
    ];

    const query = existingKeysQuery(db, candidates);
    const compiled = query?.toSQL();

    expect(compiled?.sql).toMatch(/"external_id" in \(\$1, \$2\) or ("listings"\.)?"url" in \(\$3, \$4, \$5\)/);
    expect(compiled?.params).toEqual([
      '123',
      '456',
      'https://listings.test/business/corner-bistro/123',
      'https://l.test/456',
      'https://l.test/789',
    ]);
  });

  it('skips the id lookup when no candidate has an id', () => {
    const compiled = existingKeysQuery(db, [makeCandidate({ external_id: '' })])?.toSQL();

    expect(compiled?.sql).not.toContain('"external_id" in');
    expect(compiled?.params).toEqual(['https://listings.test/business/corner-bistro/123']);
  });

  it('has nothing to look up for an empty batch', () => {
    expect(existingKeysQuery(db, [])).toBeNull();
  });
});

describe('DatabaseStorage.findExistingKeys', () => {
  it('does not touch the database for an empty batch', async () => {
    const store = new DatabaseStorage(() => { throw new Error('no database in tests'); });

    const existing = await store.findExistingKeys([]);

    expect(existing.externalIds.size).toBe(0);
    expect(existing.urls.size).toBe(0);
  });
});
