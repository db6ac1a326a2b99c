import { describe, it, expect } from 'vitest';

import {
  endsWithTerminalPunctuation,
  hasAlphanumeric,
  splitSentences,
} from '../../../src/fusion/utils/sentences';
import { safeCosine } from '../../../src/fusion/utils/vectors';

describe('splitSentences', () => {
  it('splits prose into trimmed sentences', () => {
    expect(splitSentences('The vote passed. Turnout was high.')).toEqual(['The vote passed.', 'Turnout was high.']);
  });

  it('returns nothing for blank text', () => {
    expect(splitSentences('  \n')).toEqual([]);
  });
});

describe('endsWithTerminalPunctuation', () => {
  it('accepts closing quotes and brackets after the mark', () => {
    expect(endsWithTerminalPunctuation('She said "stop."')).toBe(true);
    expect(endsWithTerminalPunctuation('It ended (finally!)')).toBe(true);
    expect(endsWithTerminalPunctuation('The vote pas')).toBe(false);
  });
});

describe('hasAlphanumeric', () => {
  it('detects letters and digits', () => {
    expect(hasAlphanumeric('...')).toBe(false);
    expect(hasAlphanumeric('7-2')).toBe(true);
  });
});

describe('safeCosine', () => {
  it('compares equal-length vectors', () => {
    expect(safeCosine([1, 0], [0, 1])).toEqual({ success: true, value: 0 });
    const same = safeCosine([3, 4], [3, 4]);
    expect(same.success && same.value).toBeCloseTo(1);
  });

  it('reports a dimension mismatch', () => {
    const result = safeCosine([1, 0], [1, 0, 0]);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Provider call cosineSimilarity failed: dimension mismatch (2 vs 3)');
    }
  });
});
