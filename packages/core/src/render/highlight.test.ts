import { describe, it, expect } from 'vitest';
import { applySpans, findHighlightSpans } from './highlight';

const sequential = { minPosition: 0, order: 'sequential' } as const;
const anyOrder = { minPosition: 0, order: 'any-order' } as const;

describe('findHighlightSpans', () => {
  describe('sequential', () => {
    it('searches each fragment after the previous match', () => {
      expect(findHighlightSpans('/x/src/main/src.ts', ['src', 'src'], sequential)).toEqual([
        { start: 3, end: 6 },
        { start: 12, end: 15 },
      ]);
    });

    it('never matches a fragment at or before the end of the previous match', () => {
      expect(findHighlightSpans('/x/src/main', ['main', 'src'], sequential)).toEqual([
        { start: 7, end: 11 },
      ]);
    });

    it('skips a missing fragment without moving the cursor', () => {
      expect(findHighlightSpans('/x/src/main/src.ts', ['main', 'zzz', 'src'], sequential)).toEqual([
        { start: 7, end: 11 },
        { start: 12, end: 15 },
      ]);
    });
  });

  describe('any order', () => {
    it('searches every fragment from the minimum position', () => {
      expect(findHighlightSpans('/x/src/main', ['main', 'src'], anyOrder)).toEqual([
        { start: 3, end: 6 },
        { start: 7, end: 11 },
      ]);
    });

    it('finds fragment k regardless of where fragment k-1 matched', () => {
      const withFirst = findHighlightSpans('/a/zz/b', ['zz', 'a'], anyOrder);
      const alone = findHighlightSpans('/a/zz/b', ['a'], anyOrder);
      expect(withFirst).toContainEqual(alone[0]);
    });

    it('moves past occurrences that overlap an earlier highlight', () => {
      expect(findHighlightSpans('/abcd/bcd', ['abc', 'bcd'], anyOrder)).toEqual([
        { start: 1, end: 4 },
        { start: 6, end: 9 },
      ]);
    });
  });

  it('ignores case', () => {
    expect(findHighlightSpans('/A/README.md', ['readme'], sequential)).toEqual([
      { start: 3, end: 9 },
    ]);
  });

  it('starts no match before the minimum position', () => {
    expect(
      findHighlightSpans('/home/home', ['home'], { minPosition: 6, order: 'sequential' }),
    ).toEqual([{ start: 6, end: 10 }]);
  });

  it('treats regex metacharacters literally', () => {
    expect(findHighlightSpans('/a/b.c/bxc', ['b.c'], sequential)).toEqual([{ start: 3, end: 6 }]);
  });
});

describe('applySpans', () => {
  it('wraps every span in one pass', () => {
    expect(
      applySpans('abcdef', [{ start: 1, end: 3 }, { start: 4, end: 5 }], (s) => `<${s}>`),
    ).toBe('a<bc>d<e>f');
  });

  it('returns the text unchanged without spans', () => {
    expect(applySpans('abc', [], (s) => `<${s}>`)).toBe('abc');
  });
});
