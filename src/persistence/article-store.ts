/**
 * Article Store
 *
 * Persistence seam for canonical articles. The pipelines only depend on this
 * interface; `KnexArticleStore` is the SQL-backed implementation.
 */

import type { StoredArticle } from '../fusion/types';

export type ArticlePredicate = (article: StoredArticle) => boolean;

export interface ArticleStore {
  /** Inserts or fully replaces the record with the same id */
  upsert(article: StoredArticle): Promise<void>;
  /** Resolves null when no record has this id */
  findById(id: string): Promise<StoredArticle | null>;
  query(predicate: ArticlePredicate): Promise<StoredArticle[]>;
  listIds(): Promise<string[]>;
}
