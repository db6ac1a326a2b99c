/**
 * Chunked Sequence
 *
 * Lazy view of a file as a sequence of decoded text windows. Each iteration
 * reopens the file, so the sequence can be walked more than once. Bytes of a
 * multi-byte character split across a window boundary are held back by the
 * decoder and emitted with the next window.
 */

import { open } from 'node:fs/promises';
import { StringDecoder } from 'node:string_decoder';

export class ChunkedSequence implements AsyncIterable<string> {
  constructor(
    readonly path: string,
    readonly windowBytes: number
  ) {
    if (!Number.isInteger(windowBytes) || windowBytes <= 0) {
      throw new RangeError(`windowBytes must be a positive integer (got ${windowBytes})`);
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string> {
    const handle = await open(this.path, 'r');
    const decoder = new StringDecoder('utf8');
    const window = Buffer.alloc(this.windowBytes);

    try {
      for (;;) {
        const { bytesRead } = await handle.read(window, 0, this.windowBytes, null);
        if (bytesRead === 0) break;
        const text = decoder.write(window.subarray(0, bytesRead));
        if (text) yield text;
      }
      const rest = decoder.end();
      if (rest) yield rest;
    } finally {
      await handle.close();
    }
  }
}
