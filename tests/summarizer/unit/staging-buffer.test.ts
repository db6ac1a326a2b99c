import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';

import { describe, it, expect } from 'vitest';

import { ChunkedSequence } from '../../../src/fusion/summarizer/chunked-sequence';
import { stageText, withStagedText } from '../../../src/fusion/summarizer/staging-buffer';

async function collect(windows: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const window of windows) out.push(window);
  return out;
}

describe('staging buffer', () => {
  it('writes UTF-8 text and removes it on release', async () => {
    const buffer = await stageText('héllo');

    expect(buffer.byteLength).toBe(6);
    await expect(readFile(buffer.path, 'utf8')).resolves.toBe('héllo');

    await buffer.release();
    expect(existsSync(buffer.path)).toBe(false);
  });

  it('releases the file when the callback rejects', async () => {
    let stagedPath = '';

    await expect(
      withStagedText('text', async (buffer) => {
        stagedPath = buffer.path;
        throw new Error('tokenizer crashed');
      })
    ).rejects.toThrow('tokenizer crashed');

    expect(stagedPath).not.toBe('');
    expect(existsSync(stagedPath)).toBe(false);
  });
});

describe('ChunkedSequence', () => {
  it('keeps multi-byte characters whole across window boundaries', async () => {
    // 'é' is two bytes, so the first 2-byte window ends mid-character
    const windows = await withStagedText('aé b', (buffer) => collect(new ChunkedSequence(buffer.path, 2)));

    expect(windows).toEqual(['a', 'é ', 'b']);
  });

  it('can be iterated more than once', async () => {
    await withStagedText('abcdef', async (buffer) => {
      const sequence = new ChunkedSequence(buffer.path, 4);

      expect(await collect(sequence)).toEqual(['abcd', 'ef']);
      expect(await collect(sequence)).toEqual(['abcd', 'ef']);
    });
  });

  it('rejects a non-positive window', () => {
    expect(() => new ChunkedSequence('/tmp/unused', 0)).toThrow(RangeError);
  });
});
