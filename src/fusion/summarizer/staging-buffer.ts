/**
 * Staging Buffer
 *
 * Spills summarizer input to a private temporary directory so the tokenizer
 * can stream it back in fixed windows. The directory is removed on every exit
 * path of `withStagedText`.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export interface StagingBuffer {
  readonly path: string;
  readonly byteLength: number;
  release(): Promise<void>;
}

const STAGING_PREFIX = 'fusion-summarizer-';

/**
 * Writes `text` as UTF-8 to a fresh staging file.
 */
export async function stageText(text: string): Promise<StagingBuffer> {
  const directory = await mkdtemp(join(tmpdir(), STAGING_PREFIX));
  const path = join(directory, 'input.txt');
  const bytes = Buffer.from(text, 'utf8');

  try {
    await writeFile(path, bytes);
  } catch (error) {
    await rm(directory, { recursive: true, force: true });
    throw error;
  }

  return {
    path,
    byteLength: bytes.length,
    release: () => rm(directory, { recursive: true, force: true }),
  };
}

/**
 * Stages `text`, runs `fn` against the buffer and releases it afterwards,
 * whether `fn` resolves or rejects.
 */
export async function withStagedText<T>(text: string, fn: (buffer: StagingBuffer) => Promise<T>): Promise<T> {
  const buffer = await stageText(text);
  try {
    return await fn(buffer);
  } finally {
    await buffer.release();
  }
}
