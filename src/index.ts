/**
 * Article Fusion Engine
 *
 * Fuses many web sources about one story into a single canonical article:
 * a deduplicated content pool, embedding-based relevance and image
 * consensus, a bounded-memory extractive summarizer and a publish gate.
 *
 * ```typescript
 * import { AppContext } from 'article-fusion-engine';
 *
 * const app = await AppContext.init();
 * try {
 *   await app.pipeline.processNewArticles(seeds);
 *   await app.pipeline.updateAll();
 * } finally {
 *   await app.teardown();
 * }
 * ```
 */

export { AppContext, type AppContextOptions } from './app-context';

// Fusion core
export { ContentPool, type AddOutcome, type BackfillReport, type ContentPoolDeps } from './fusion/content-pool';
export { RelevanceSelector, calculateThreshold, preprocessText } from './fusion/relevance-selector';
export { ConsensusImageSelector, prepareCandidates, quorumFor } from './fusion/consensus-image-selector';
export { ExtractiveSummarizer, summarize, summarizeContent } from './fusion/summarizer';
export { buildArticle, mergeArticles } from './fusion/article-builder';
export { TextCleaner, cleanText } from './fusion/text-cleaner';
export { generateTags, TagSelectionSchema, type TopicLabel } from './fusion/tagger';
export { FusionPipeline, type ArticleSeed, type PipelineOutcome } from './fusion/pipeline';
export { TaskPool } from './fusion/utils/task-pool';
export * from './fusion/errors';
export * from './fusion/result';
export * from './fusion/types';

// Collaborators
export { ExaAcquisition } from './acquisition/exa';
export { loadEnvironment, parseEnvironment, type ProviderSettings } from './ai/config';
export { createProviderRegistry, type ProviderRegistry } from './ai/providers/registry';
export type { ArticleStore, ArticlePredicate } from './persistence/article-store';
export { KnexArticleStore, createSchema } from './persistence/knex-article-store';

export { createPrefixedLogger, createStructuredLogger, type Logger } from './utils/logger';
