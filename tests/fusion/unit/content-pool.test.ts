import { describe, it, expect, vi } from 'vitest';

import { ContentPool } from '../../../src/fusion/content-pool';
import type { AcquisitionCollaborator, RawSourceItem } from '../../../src/fusion/types';
import type { Logger } from '../../../src/utils/logger';

function createLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function item(url: string, overrides: Partial<RawSourceItem> = {}): RawSourceItem {
  return {
    url,
    title: `Title from ${url}`,
    paragraphs: [`Paragraph from ${url}`],
    images: [],
    author: '',
    domain: '',
    ...overrides,
  };
}

function createAcquisition(
  search: AcquisitionCollaborator['search'] = async () => [],
  fetch: AcquisitionCollaborator['fetch'] = async (url) => item(url)
) {
  return { search: vi.fn(search), fetch: vi.fn(fetch) };
}

describe('ContentPool', () => {
  describe('add', () => {
    it('is idempotent for the same item', () => {
      const pool = new ContentPool({ acquisition: createAcquisition(), logger: createLogger() });
      const source = item('https://a.example.com/story', {
        images: ['https://cdn.example.com/1.jpg'],
        author: 'Jane Doe',
      });

      expect(pool.add(source)).toBe('added');
      const once = pool.snapshot();
      expect(pool.add(source)).toBe('duplicate_source');

      expect(pool.snapshot()).toEqual(once);
    });

    it('keeps one source per normalized domain', () => {
      const pool = new ContentPool({ acquisition: createAcquisition(), logger: createLogger() });

      expect(pool.add(item('https://www.example.com/one'))).toBe('added');
      expect(pool.add(item('https://example.com/two'))).toBe('duplicate_domain');

      const snapshot = pool.snapshot();
      expect(snapshot.sources).toEqual(['https://www.example.com/one']);
      expect(snapshot.paragraphs).toEqual(['Paragraph from https://www.example.com/one']);
      expect([...snapshot.seenDomains]).toEqual(['example.com']);
    });

    it('deduplicates field entries case-insensitively, first seen wins', () => {
      const pool = new ContentPool({ acquisition: createAcquisition(), logger: createLogger() });

      pool.add(item('https://a.example.com/1', { paragraphs: ['Same text.', ' same TEXT. '] }));
      pool.add(item('https://b.example.com/1', { paragraphs: ['SAME TEXT.', 'Other text.'] }));

      expect(pool.snapshot().paragraphs).toEqual(['Same text.', 'Other text.']);
    });

    it('reduces profile-URL authors to their domain', () => {
      const pool = new ContentPool({ acquisition: createAcquisition(), logger: createLogger() });

      pool.add(item('https://a.example.com/1', { author: 'https://www.reuters.com/authors/jane' }));
      pool.add(item('https://b.example.com/1', { author: 'Jane Doe' }));

      expect(pool.snapshot().authors).toEqual(['reuters.com', 'Jane Doe']);
    });

    it('prefers the declared domain over the URL host', () => {
      const pool = new ContentPool({ acquisition: createAcquisition(), logger: createLogger() });

      pool.add(item('https://amp.example.net/1', { domain: 'WWW.Example.net' }));

      expect([...pool.snapshot().seenDomains]).toEqual(['example.net']);
    });
  });

  describe('seed', () => {
    it('registers seeded sources and excludes their domains from search', async () => {
      const acquisition = createAcquisition();
      const pool = new ContentPool(
        { acquisition, logger: createLogger() },
        { titles: ['Bridge vote'], sources: ['https://www.a.example.com/x'] }
      );

      await pool.ensureSufficient('paragraphs', 1);

      expect(acquisition.search).toHaveBeenCalledWith('Bridge vote', ['a.example.com'], 1);
      expect(pool.add(item('https://a.example.com/other'))).toBe('duplicate_domain');
    });
  });

  describe('ensureSufficient', () => {
    it('terminates with an empty pool when the collaborator has nothing', async () => {
      const acquisition = createAcquisition(async () => []);
      const pool = new ContentPool({ acquisition, logger: createLogger() });

      const report = await pool.ensureSufficient('paragraphs', 5);

      expect(report).toEqual({
        field: 'paragraphs',
        threshold: 5,
        count: 0,
        rounds: 1,
        fetched: 0,
        failed: 0,
        stopReason: 'no_candidates',
      });
      expect(pool.count('paragraphs')).toBe(0);
      expect(acquisition.search).toHaveBeenCalledWith('current events', [], 5);
      expect(acquisition.fetch).not.toHaveBeenCalled();
    });

    it('does nothing when the field is already sufficient', async () => {
      const acquisition = createAcquisition();
      const pool = new ContentPool({ acquisition, logger: createLogger() }, { titles: ['A', 'B'] });

      const report = await pool.ensureSufficient('titles', 2);

      expect(report.stopReason).toBe('satisfied');
      expect(report.rounds).toBe(0);
      expect(acquisition.search).not.toHaveBeenCalled();
    });

    it('searches again with seen domains excluded until satisfied', async () => {
      const search = vi
        .fn<AcquisitionCollaborator['search']>()
        .mockResolvedValueOnce([
          'https://a.example.com/1',
          'https://b.example.com/1',
          'https://a.example.com/2',
        ])
        .mockResolvedValueOnce(['https://c.example.com/1']);
      const acquisition = { search, fetch: vi.fn(async (url: string) => item(url)) };
      const pool = new ContentPool({ acquisition, logger: createLogger() }, { titles: ['Bridge'] });

      const report = await pool.ensureSufficient('paragraphs', 3);

      expect(report).toMatchObject({ count: 3, rounds: 2, fetched: 4, failed: 0, stopReason: 'satisfied' });
      expect(search).toHaveBeenNthCalledWith(1, 'Bridge', [], 3);
      expect(search).toHaveBeenNthCalledWith(2, 'Bridge', ['a.example.com', 'b.example.com'], 1);
      expect(pool.snapshot().sources).toEqual([
        'https://a.example.com/1',
        'https://b.example.com/1',
        'https://c.example.com/1',
      ]);
    });

    it('skips candidates already attempted or on a seen domain', async () => {
      const search = vi
        .fn<AcquisitionCollaborator['search']>()
        .mockResolvedValueOnce(['https://a.example.com/1'])
        .mockResolvedValueOnce(['https://a.example.com/1', 'https://a.example.com/9']);
      const fetch = vi.fn(async (url: string) => item(url, { paragraphs: [] }));
      const pool = new ContentPool({ acquisition: { search, fetch }, logger: createLogger() });

      const report = await pool.ensureSufficient('paragraphs', 2);

      expect(fetch).toHaveBeenCalledTimes(1);
      expect(report.stopReason).toBe('no_candidates');
      expect(report.rounds).toBe(2);
    });

    it('logs and skips failed fetches', async () => {
      const logger = createLogger();
      const search = vi
        .fn<AcquisitionCollaborator['search']>()
        .mockResolvedValueOnce(['https://a.example.com/1', 'https://b.example.com/1'])
        .mockResolvedValue([]);
      const fetch = vi.fn(async (url: string) => {
        if (url.includes('a.example.com')) throw new Error('HTTP 403');
        return item(url);
      });
      const pool = new ContentPool({ acquisition: { search, fetch }, logger });

      const report = await pool.ensureSufficient('paragraphs', 2);

      expect(report).toMatchObject({ count: 1, fetched: 1, failed: 1, stopReason: 'no_candidates' });
      expect(logger.warn).toHaveBeenCalledWith('Failed to acquire https://a.example.com/1: HTTP 403');
    });

    it('treats a failed search as no candidates', async () => {
      const acquisition = createAcquisition(async () => {
        throw new Error('search down');
      });
      const pool = new ContentPool({ acquisition, logger: createLogger() });

      const report = await pool.ensureSufficient('paragraphs', 2);

      expect(report.stopReason).toBe('no_candidates');
      expect(report.count).toBe(0);
    });

    it('stops after `threshold` rounds even when candidates keep coming', async () => {
      let n = 0;
      const acquisition = createAcquisition(
        async () => [`https://site${++n}.example.com/story`],
        async (url) => item(url, { paragraphs: [] })
      );
      const pool = new ContentPool({ acquisition, logger: createLogger() });

      const report = await pool.ensureSufficient('paragraphs', 2);

      expect(report).toMatchObject({ count: 0, rounds: 2, fetched: 2, stopReason: 'budget_exhausted' });
      expect(acquisition.search).toHaveBeenCalledTimes(2);
    });

    it('fetches a round in batches of fetchConcurrency', async () => {
      let active = 0;
      let peak = 0;
      const search = vi
        .fn<AcquisitionCollaborator['search']>()
        .mockResolvedValueOnce([1, 2, 3, 4].map((i) => `https://s${i}.example.com/`))
        .mockResolvedValue([]);
      const fetch = vi.fn(async (url: string) => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return item(url);
      });
      const pool = new ContentPool({ acquisition: { search, fetch }, logger: createLogger(), fetchConcurrency: 2 });

      await pool.ensureSufficient('paragraphs', 4);

      expect(peak).toBe(2);
      expect(pool.count('sources')).toBe(4);
    });
  });
});
