/**
 * Knex Article Store
 *
 * Stores canonical articles in a single `articles` table. List fields are
 * JSON-encoded text columns so the same schema works on SQLite and Postgres.
 * Any database error surfaces as a `TerminalFailure`.
 */

import type { Knex } from 'knex';
import { z } from 'zod';

import { TerminalFailure, describeError } from '../fusion/errors';
import type { StoredArticle } from '../fusion/types';
import { createPrefixedLogger, type Logger } from '../utils/logger';
import type { ArticlePredicate, ArticleStore } from './article-store';

// ============================================================================
// Schema
// ============================================================================

export const ARTICLES_TABLE = 'articles';

/**
 * Row shape of the `articles` table.
 */
export interface ArticleRow {
  id: string;
  title: string;
  description: string;
  images: string;
  sources: string;
  authors: string;
  tags: string;
  crowd_sourced_urls: string;
  published_at: string;
  updated_at: string;
}

/**
 * Creates the `articles` table when it does not exist yet.
 */
export async function createSchema(knex: Knex): Promise<void> {
  const exists = await knex.schema.hasTable(ARTICLES_TABLE);
  if (exists) return;

  await knex.schema.createTable(ARTICLES_TABLE, (table) => {
    table.string('id').primary();
    table.text('title').notNullable();
    table.text('description').notNullable();
    table.text('images').notNullable();
    table.text('sources').notNullable();
    table.text('authors').notNullable();
    table.text('tags').notNullable();
    table.text('crowd_sourced_urls').notNullable();
    table.string('published_at').notNullable();
    table.string('updated_at').notNullable();
  });
}

// ============================================================================
// Row Mapping
// ============================================================================

const StringListSchema = z.array(z.string());

function decodeList(column: string, raw: string): string[] {
  const parsed = StringListSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Column ${column} does not hold a string list`);
  }
  return parsed.data;
}

export function toRow(article: StoredArticle): ArticleRow {
  return {
    id: article.id,
    title: article.title,
    description: article.description,
    images: JSON.stringify(article.images),
    sources: JSON.stringify(article.sources),
    authors: JSON.stringify(article.authors),
    tags: JSON.stringify(article.tags),
    crowd_sourced_urls: JSON.stringify(article.crowdSourcedUrls),
    published_at: article.publishedAt,
    updated_at: article.updatedAt,
  };
}

export function fromRow(row: ArticleRow): StoredArticle {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    images: decodeList('images', row.images),
    sources: decodeList('sources', row.sources),
    authors: decodeList('authors', row.authors),
    tags: decodeList('tags', row.tags),
    crowdSourcedUrls: decodeList('crowd_sourced_urls', row.crowd_sourced_urls),
    publishedAt: row.published_at,
    updatedAt: row.updated_at,
  };
}

// ============================================================================
// Store
// ============================================================================

export interface KnexArticleStoreDeps {
  readonly knex: Knex;
  readonly logger?: Logger;
}

export class KnexArticleStore implements ArticleStore {
  private readonly knex: Knex;
  private readonly log: Logger;

  constructor(deps: KnexArticleStoreDeps) {
    this.knex = deps.knex;
    this.log = deps.logger ?? createPrefixedLogger('[ArticleStore]');
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.log.error(`${operation} failed: ${describeError(error)}`);
      throw new TerminalFailure(operation, error);
    }
  }

  upsert(article: StoredArticle): Promise<void> {
    return this.guard(`upsert(${article.id})`, async () => {
      await this.knex<ArticleRow>(ARTICLES_TABLE).insert(toRow(article)).onConflict('id').merge();
      this.log.debug(`Stored article ${article.id}`);
    });
  }

  findById(id: string): Promise<StoredArticle | null> {
    return this.guard(`findById(${id})`, async () => {
      const row = await this.knex<ArticleRow>(ARTICLES_TABLE).where('id', id).first();
      return row ? fromRow(row) : null;
    });
  }

  query(predicate: ArticlePredicate): Promise<StoredArticle[]> {
    return this.guard('query', async () => {
      const rows = await this.knex<ArticleRow>(ARTICLES_TABLE).select('*').orderBy('published_at', 'asc');
      return rows.map(fromRow).filter(predicate);
    });
  }

  listIds(): Promise<string[]> {
    return this.guard('listIds', async () => {
      const rows = await this.knex<ArticleRow>(ARTICLES_TABLE).select('id').orderBy('id', 'asc');
      return rows.map((row) => row.id);
    });
  }
}
