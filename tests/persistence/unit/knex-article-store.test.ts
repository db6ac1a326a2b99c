/**
 * Knex Article Store Tests
 *
 * Runs against an in-memory SQLite database per test.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import knex, { type Knex } from 'knex';

import { TerminalFailure } from '../../../src/fusion/errors';
import type { StoredArticle } from '../../../src/fusion/types';
import {
  ARTICLES_TABLE,
  KnexArticleStore,
  createSchema,
  fromRow,
  toRow,
} from '../../../src/persistence/knex-article-store';
import { silentLogger } from '../../../src/utils/logger';

function article(id: string, overrides: Partial<StoredArticle> = {}): StoredArticle {
  return {
    id,
    title: `Title ${id}`,
    description: `Description ${id}`,
    images: [`https://cdn.example.com/${id}.jpg`],
    sources: [`https://news.example.com/${id}`],
    authors: ['Dana Reporter'],
    tags: ['Politics'],
    publishedAt: '2026-03-01T12:00:00.000Z',
    updatedAt: '2026-03-01T12:00:00.000Z',
    crowdSourcedUrls: [],
    ...overrides,
  };
}

describe('row mapping', () => {
  it('encodes list fields as JSON text', () => {
    const row = toRow(article('a', { crowdSourcedUrls: ['https://other.example.com/x'] }));

    expect(row.images).toBe('["https://cdn.example.com/a.jpg"]');
    expect(row.crowd_sourced_urls).toBe('["https://other.example.com/x"]');
    expect(row.published_at).toBe('2026-03-01T12:00:00.000Z');
    expect(fromRow(row)).toEqual(article('a', { crowdSourcedUrls: ['https://other.example.com/x'] }));
  });
});

describe('KnexArticleStore', () => {
  let db: Knex;
  let store: KnexArticleStore;

  beforeEach(async () => {
    db = knex({ client: 'better-sqlite3', connection: { filename: ':memory:' }, useNullAsDefault: true });
    await createSchema(db);
    store = new KnexArticleStore({ knex: db, logger: silentLogger });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('creates the schema once', async () => {
    await createSchema(db);

    await expect(db.schema.hasTable(ARTICLES_TABLE)).resolves.toBe(true);
  });

  it('stores and reads back an article', async () => {
    await store.upsert(article('a'));

    await expect(store.findById('a')).resolves.toEqual(article('a'));
    await expect(store.findById('missing')).resolves.toBeNull();
  });

  it('replaces the record with the same id', async () => {
    await store.upsert(article('a'));
    await store.upsert(article('a', { title: 'Revised', images: ['https://cdn.example.com/new.jpg'] }));

    await expect(store.findById('a')).resolves.toEqual(
      article('a', { title: 'Revised', images: ['https://cdn.example.com/new.jpg'] })
    );
    await expect(store.listIds()).resolves.toEqual(['a']);
  });

  it('queries by predicate in publication order', async () => {
    await store.upsert(article('late', { publishedAt: '2026-03-02T00:00:00.000Z', tags: ['Sports'] }));
    await store.upsert(article('early', { publishedAt: '2026-03-01T00:00:00.000Z' }));
    await store.upsert(article('middle', { publishedAt: '2026-03-01T12:00:00.000Z' }));

    const politics = await store.query((stored) => stored.tags.includes('Politics'));

    expect(politics.map((stored) => stored.id)).toEqual(['early', 'middle']);
  });

  it('lists ids in order', async () => {
    await store.upsert(article('b'));
    await store.upsert(article('a'));

    await expect(store.listIds()).resolves.toEqual(['a', 'b']);
  });

  it('reports a malformed row as a terminal failure', async () => {
    await db(ARTICLES_TABLE).insert({ ...toRow(article('bad')), images: '{"url":1}' });

    const rejection = store.findById('bad');

    await expect(rejection).rejects.toBeInstanceOf(TerminalFailure);
    await expect(rejection).rejects.toThrow('findById(bad) failed: Column images does not hold a string list');
  });

  it('reports an unreachable database as a terminal failure', async () => {
    await db.destroy();

    await expect(store.upsert(article('a'))).rejects.toBeInstanceOf(TerminalFailure);

    // afterEach destroys again; give it a live connection
    db = knex({ client: 'better-sqlite3', connection: { filename: ':memory:' }, useNullAsDefault: true });
  });
});
