/**
 * Fusion Pipeline Tests
 *
 * Collaborators are in-process fakes; summarization and selection are
 * spied so the expected records can be traced by hand.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

import { ConsensusImageSelector } from '../../../src/fusion/consensus-image-selector';
import { TerminalFailure } from '../../../src/fusion/errors';
import { FusionPipeline, inDocumentOrder, type PipelineOutcome } from '../../../src/fusion/pipeline';
import { RelevanceSelector } from '../../../src/fusion/relevance-selector';
import { TextCleaner } from '../../../src/fusion/text-cleaner';
import type { EmbeddingProvider, RawSourceItem, StoredArticle } from '../../../src/fusion/types';
import { silentLogger } from '../../../src/utils/logger';
import { InMemoryArticleStore } from '../../mocks/article-store';

const NOW = new Date('2026-03-01T12:00:00.000Z');

const SOURCE_A: RawSourceItem = {
  url: 'https://news-one.example.com/story',
  title: 'Council approves bridge',
  paragraphs: ['The council voted 7-2.', 'Work starts in spring.'],
  images: ['https://cdn.example.com/a.jpg'],
  author: 'Dana Reporter',
  domain: '',
};

const SOURCE_B: RawSourceItem = {
  url: 'https://news-two.example.org/b',
  title: 'Bridge vote passes',
  paragraphs: ['Residents welcomed the decision.'],
  images: ['https://cdn.example.com/b.jpg'],
  author: 'Lee Writer',
  domain: 'news-two.example.org',
};

const SOURCE_C: RawSourceItem = {
  url: 'https://news-three.example.net/c',
  title: 'Bridge funding confirmed',
  paragraphs: ['Funding comes from the state.'],
  images: ['https://cdn.example.com/c.jpg'],
  author: 'Sam Field',
  domain: '',
};

const splitOnPeriods = (text: string): string[] =>
  text
    .split(/(?<=\.)\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);

function createHarness(pages: readonly RawSourceItem[], store = new InMemoryArticleStore()) {
  const byUrl = new Map(pages.map((page) => [page.url, page]));
  const acquisition = {
    search: vi.fn(async (_seed: string, _excluded: readonly string[], _count: number): Promise<string[]> => []),
    fetch: vi.fn(async (url: string): Promise<RawSourceItem> => {
      const page = byUrl.get(url);
      if (!page) throw new Error(`404 for ${url}`);
      return page;
    }),
  };
  const embedder: EmbeddingProvider = {
    embedText: vi.fn(async () => [1, 0]),
    embedImage: vi.fn(async () => [1, 0]),
  };

  const cleaner = new TextCleaner({ logger: silentLogger });
  const summarize = vi.spyOn(cleaner, 'summarizeAndClean').mockImplementation(async (texts, options) =>
    options?.title ? (texts[0] ?? '') : texts.join(' ')
  );
  const relevance = new RelevanceSelector({ embedder, logger: silentLogger });
  const selectRelevant = vi.spyOn(relevance, 'select');
  const consensus = new ConsensusImageSelector({ embedder, logger: silentLogger });
  const selectImages = vi.spyOn(consensus, 'select').mockImplementation(async (images) => [...images]);

  let nextId = 0;
  const pipeline = new FusionPipeline(
    {
      acquisition,
      store,
      embedder,
      cleaner,
      relevance,
      consensus,
      splitSentences: splitOnPeriods,
      logger: silentLogger,
      now: () => NOW,
      generateId: () => `article-${++nextId}`,
    },
    { minParagraphs: 3 }
  );

  return { pipeline, acquisition, store, summarize, selectRelevant, selectImages };
}

describe('inDocumentOrder', () => {
  it('orders selected sentences by position in the text', () => {
    const text = 'First point. Second point. Third point.';

    expect(inDocumentOrder(['Third point.', 'First point.'], text)).toEqual(['First point.', 'Third point.']);
  });
});

describe('FusionPipeline', () => {
  describe('processNewArticle', () => {
    it('backfills, fuses and publishes a new article', async () => {
      const harness = createHarness([SOURCE_A, SOURCE_B]);
      harness.acquisition.search.mockResolvedValueOnce([SOURCE_B.url]);
      harness.selectRelevant.mockResolvedValueOnce([
        'Residents welcomed the decision.',
        'The council voted 7-2.',
      ]);
      harness.selectImages.mockResolvedValueOnce(['https://cdn.example.com/b.jpg']);

      const outcome = await harness.pipeline.processNewArticle({
        url: SOURCE_A.url,
        image: 'https://cdn.example.com/feed.jpg',
      });

      const expected: StoredArticle = {
        id: 'article-1',
        title: 'Council approves bridge',
        description: 'The council voted 7-2. Residents welcomed the decision.',
        images: ['https://cdn.example.com/feed.jpg', 'https://cdn.example.com/b.jpg'],
        sources: [SOURCE_A.url, SOURCE_B.url],
        authors: ['Dana Reporter', 'Lee Writer'],
        tags: [],
        publishedAt: '2026-03-01T12:00:00.000Z',
        updatedAt: '2026-03-01T12:00:00.000Z',
        crowdSourcedUrls: [],
      };
      expect(outcome).toEqual({ status: 'published', article: expected });
      expect(harness.store.records.get('article-1')).toEqual(expected);
      expect(harness.acquisition.search).toHaveBeenCalledWith(
        'Council approves bridge',
        ['news-one.example.com'],
        1
      );
      expect(harness.selectRelevant).toHaveBeenCalledWith(
        'Council approves bridge',
        'The council voted 7-2. Work starts in spring. Residents welcomed the decision.'
      );
    });

    it('pools the feed fields alongside the fetched seed page', async () => {
      const harness = createHarness([SOURCE_A]);
      harness.selectRelevant.mockResolvedValueOnce([]);

      const outcome = await harness.pipeline.processNewArticle({
        url: SOURCE_A.url,
        title: 'Bridge plan wins council vote',
        description: 'Feed summary of the vote.',
        author: 'Feed Desk',
      });

      expect(harness.summarize).toHaveBeenCalledWith(['Bridge plan wins council vote', 'Council approves bridge'], {
        title: true,
      });
      expect(harness.summarize).toHaveBeenCalledWith([
        'Feed summary of the vote.',
        'The council voted 7-2.',
        'Work starts in spring.',
      ]);
      expect(harness.acquisition.search).not.toHaveBeenCalled();
      expect(outcome.status).toBe('published');
      if (outcome.status === 'published') {
        expect(outcome.article.title).toBe('Bridge plan wins council vote');
        expect(outcome.article.description).toBe(
          'Feed summary of the vote. The council voted 7-2. Work starts in spring.'
        );
        expect(outcome.article.sources).toEqual([SOURCE_A.url]);
        expect(outcome.article.authors).toEqual(['Feed Desk', 'Dana Reporter']);
        expect(outcome.article.images).toEqual(['https://cdn.example.com/a.jpg']);
      }
    });

    it('falls back to the feed fields when the seed page cannot be fetched', async () => {
      const harness = createHarness([]);

      const outcome = await harness.pipeline.processNewArticle({
        url: 'https://news-four.example.com/storm',
        title: 'Storm closes highway',
        description: 'Crews cleared the road overnight.',
        image: 'https://cdn.example.com/storm.jpg',
      });

      expect(outcome.status).toBe('published');
      if (outcome.status === 'published') {
        expect(outcome.article.title).toBe('Storm closes highway');
        expect(outcome.article.description).toBe('Crews cleared the road overnight.');
        expect(outcome.article.images).toEqual(['https://cdn.example.com/storm.jpg']);
      }
      // One sentence is below the relevance cut-in
      expect(harness.selectRelevant).not.toHaveBeenCalled();
    });

    it('discards an article without images', async () => {
      const harness = createHarness([]);
      harness.selectImages.mockResolvedValueOnce([]);

      const outcome = await harness.pipeline.processNewArticle({
        url: 'https://news-four.example.com/storm',
        title: 'Storm closes highway',
        description: 'Crews cleared the road overnight.',
      });

      expect(outcome).toEqual({ status: 'discarded', reason: 'no_images' });
      expect(harness.store.records.size).toBe(0);
    });

    it('discards when no title can be produced', async () => {
      const harness = createHarness([]);

      const outcome = await harness.pipeline.processNewArticle({ url: 'https://news-four.example.com/x' });

      expect(outcome).toEqual({ status: 'discarded', reason: 'no_content' });
    });

    it('reports a persistence error as a failed outcome', async () => {
      const store = new InMemoryArticleStore();
      vi.spyOn(store, 'upsert').mockRejectedValueOnce(new Error('disk full'));
      const harness = createHarness([SOURCE_A], store);

      const outcome = await harness.pipeline.processNewArticle({ url: SOURCE_A.url });

      expect(outcome.status).toBe('failed');
      if (outcome.status === 'failed') {
        expect(outcome.error).toBeInstanceOf(TerminalFailure);
        expect(outcome.error.message).toBe(`processNewArticle(${SOURCE_A.url}) failed: disk full`);
      }
    });
  });

  describe('updateArticle', () => {
    const EXISTING: StoredArticle = {
      id: 'article-1',
      title: 'Council approves bridge',
      description: 'The council voted 7-2.',
      images: ['https://cdn.example.com/a.jpg'],
      sources: [SOURCE_A.url],
      authors: ['Dana Reporter'],
      tags: ['Politics'],
      publishedAt: '2026-02-01T00:00:00.000Z',
      updatedAt: '2026-02-01T00:00:00.000Z',
      crowdSourcedUrls: [SOURCE_C.url],
    };

    let harness: ReturnType<typeof createHarness>;

    beforeEach(() => {
      harness = createHarness([SOURCE_C], new InMemoryArticleStore([EXISTING]));
    });

    it('merges crowd-sourced material into the stored article', async () => {
      const outcome = await harness.pipeline.updateArticle('article-1');

      const expected: StoredArticle = {
        ...EXISTING,
        description: 'The council voted 7-2. Funding comes from the state.',
        images: ['https://cdn.example.com/a.jpg', 'https://cdn.example.com/c.jpg'],
        sources: [SOURCE_A.url, SOURCE_C.url],
        authors: ['Dana Reporter', 'Sam Field'],
        tags: ['Politics'],
        updatedAt: '2026-03-01T12:00:00.000Z',
        crowdSourcedUrls: [],
      };
      expect(outcome).toEqual({ status: 'published', article: expected });
      expect(harness.store.records.get('article-1')).toEqual(expected);
    });

    it('keeps existing images when the update selects none', async () => {
      harness.selectImages.mockResolvedValueOnce([]);

      const outcome = await harness.pipeline.updateArticle('article-1');

      expect(outcome.status).toBe('published');
      if (outcome.status === 'published') {
        expect(outcome.article.images).toEqual(['https://cdn.example.com/a.jpg']);
      }
    });

    it('leaves an article without crowd-sourced URLs unchanged', async () => {
      await harness.store.upsert({ ...EXISTING, crowdSourcedUrls: [] });

      await expect(harness.pipeline.updateArticle('article-1')).resolves.toEqual({
        status: 'unchanged',
        id: 'article-1',
      });
      expect(harness.acquisition.fetch).not.toHaveBeenCalled();
    });

    it('reports unknown ids', async () => {
      await expect(harness.pipeline.updateArticle('missing')).resolves.toEqual({
        status: 'discarded',
        reason: 'not_found',
        id: 'missing',
      });
    });

    it('updates every stored article', async () => {
      const outcomes = await harness.pipeline.updateAll();

      expect(outcomes.map((outcome) => outcome.status)).toEqual(['published']);
    });
  });

  describe('runBatch', () => {
    it('isolates a failing item from the rest of the batch', async () => {
      const { pipeline } = createHarness([]);

      const outcomes = await pipeline.runBatch(['a', 'b'], async (id): Promise<PipelineOutcome> => {
        if (id === 'a') throw new Error('boom');
        return { status: 'unchanged', id };
      });

      expect(outcomes[0]?.status).toBe('failed');
      if (outcomes[0]?.status === 'failed') {
        expect(outcomes[0].error.message).toBe('runBatch failed: boom');
      }
      expect(outcomes[1]).toEqual({ status: 'unchanged', id: 'b' });
    });

    it('processes a batch of seeds in order', async () => {
      const { pipeline } = createHarness([SOURCE_A]);

      const outcomes = await pipeline.processNewArticles([
        { url: SOURCE_A.url },
        { url: 'https://news-four.example.com/x' },
      ]);

      expect(outcomes.map((outcome) => outcome.status)).toEqual(['published', 'discarded']);
    });
  });
});
