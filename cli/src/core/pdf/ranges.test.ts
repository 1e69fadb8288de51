import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from './errors.js';
import {
  equalPartition,
  formatPageRange,
  pageIndicesOf,
  parsePageRanges,
  validatePageRanges,
  validatePartCount,
} from './ranges.js';

describe('pageIndicesOf', () => {
  it('maps a 1-based inclusive range to 0-based indices', () => {
    expect(pageIndicesOf({ start: 3, end: 5 })).toEqual([2, 3, 4]);
    expect(pageIndicesOf({ start: 7, end: 7 })).toEqual([6]);
  });

  it('is empty for an empty document', () => {
    expect(pageIndicesOf({ start: 1, end: 0 })).toEqual([]);
  });
});

describe('parsePageRanges', () => {
  it('parses comma-separated ranges and single pages', () => {
    expect(parsePageRanges('1-3, 4-7,9')).toEqual([
      { start: 1, end: 3 },
      { start: 4, end: 7 },
      { start: 9, end: 9 },
    ]);
  });

  it('tolerates spaces around the dash and empty entries', () => {
    expect(parsePageRanges(' 2 - 5 ,, 6 ')).toEqual([
      { start: 2, end: 5 },
      { start: 6, end: 6 },
    ]);
  });

  it('allows overlapping ranges', () => {
    expect(parsePageRanges('1-4,3-6')).toEqual([
      { start: 1, end: 4 },
      { start: 3, end: 6 },
    ]);
  });

  it('rejects an empty list', () => {
    expect(() => parsePageRanges(' , ')).toThrow(InvalidArgumentError);
  });

  it('rejects malformed entries', () => {
    expect(() => parsePageRanges('1-3,abc')).toThrow('Invalid page range "abc"');
    expect(() => parsePageRanges('1-')).toThrow('Invalid page range "1-"');
  });

  it('rejects page zero', () => {
    expect(() => parsePageRanges('0-2')).toThrow('Page numbers must be positive (got "0-2")');
  });

  it('rejects a reversed range', () => {
    expect(() => parsePageRanges('5-2')).toThrow('Invalid range "5-2" — start must be <= end');
  });

  it('rejects ranges past the page count instead of clamping them', () => {
    expect(() => parsePageRanges('1-3,8-12', 10)).toThrow('Range "8-12" exceeds page count (10 pages)');
  });
});

describe('validatePageRanges', () => {
  it('accepts ranges inside the document', () => {
    expect(() => validatePageRanges([{ start: 1, end: 10 }], 10)).not.toThrow();
  });

  it('rejects non-integer page numbers', () => {
    expect(() => validatePageRanges([{ start: 1.5, end: 2 }])).toThrow(InvalidArgumentError);
  });

  it('rejects an empty list', () => {
    expect(() => validatePageRanges([])).toThrow('At least one page range is required');
  });
});

describe('validatePartCount', () => {
  it('accepts positive integers', () => {
    expect(() => validatePartCount(1)).not.toThrow();
  });

  it('rejects zero, negatives and fractions', () => {
    expect(() => validatePartCount(0)).toThrow(InvalidArgumentError);
    expect(() => validatePartCount(-2)).toThrow(InvalidArgumentError);
    expect(() => validatePartCount(2.5)).toThrow(InvalidArgumentError);
  });
});

describe('equalPartition', () => {
  it('splits 10 pages into 3 parts of ceil(10/3) = 4 pages', () => {
    expect(equalPartition(10, 3)).toEqual([
      { sequence: 1, start: 1, end: 4 },
      { sequence: 2, start: 5, end: 8 },
      { sequence: 3, start: 9, end: 10 },
    ]);
  });

  it('stops once a part would start past the last page', () => {
    // ceil(2/5) = 1 → 1-1, 2-2; part 3 would start at 3
    expect(equalPartition(2, 5)).toEqual([
      { sequence: 1, start: 1, end: 1 },
      { sequence: 2, start: 2, end: 2 },
    ]);
  });

  it('can produce fewer parts than requested even when pages >= parts', () => {
    // ceil(10/4) = 3 → 1-3, 4-6, 7-9, 10-10
    expect(equalPartition(10, 4)).toHaveLength(4);
    // ceil(9/6) = 2 → 1-2, 3-4, 5-6, 7-8, 9-9; part 6 would start at 11
    expect(equalPartition(9, 6).map(formatPageRange)).toEqual(['1-2', '3-4', '5-6', '7-8', '9']);
  });

  it('returns nothing for an empty document', () => {
    expect(equalPartition(0, 3)).toEqual([]);
  });

  it('rejects a part count below one', () => {
    expect(() => equalPartition(10, 0)).toThrow(InvalidArgumentError);
  });
});
