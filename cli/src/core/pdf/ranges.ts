/**
 * Page-range parsing, validation and equal partitioning.
 */

import { InvalidArgumentError } from './errors.js';
import type { PageRange, PlannedPart } from './types.js';

/** "1-3" or "7" */
export function formatPageRange(range: PageRange): string {
  return range.start === range.end ? `${range.start}` : `${range.start}-${range.end}`;
}

/** 0-based page indices covered by a 1-based inclusive range. */
export function pageIndicesOf(range: PageRange): number[] {
  return Array.from({ length: Math.max(0, range.end - range.start + 1) }, (_, i) => range.start - 1 + i);
}

/**
 * Parse a manual page-range string into PageRange[].
 *
 * Format: "1-3, 4-6, 7" (1-based, inclusive ranges, comma-separated).
 * Overlapping ranges are allowed: a page may go to several outputs.
 * When `pageCount` is given, ranges must also end within the document.
 *
 * @throws InvalidArgumentError on invalid format or range.
 */
export function parsePageRanges(rangesStr: string, pageCount?: number): PageRange[] {
  const parts = rangesStr.split(',').map((s) => s.trim()).filter(Boolean);
  if (parts.length === 0) {
    throw new InvalidArgumentError('Empty page range — provide ranges like "1-3,4-6,7"');
  }

  const ranges: PageRange[] = [];
  for (const part of parts) {
    const match = part.match(/^(\d+)\s*(?:-\s*(\d+))?$/);
    if (!match) {
      throw new InvalidArgumentError(`Invalid page range "${part}" — use format "1-3" or "7"`);
    }

    const start = parseInt(match[1], 10);
    const end = match[2] ? parseInt(match[2], 10) : start;
    ranges.push({ start, end });
  }

  validatePageRanges(ranges, pageCount);
  return ranges;
}

/**
 * Check 1 ≤ start ≤ end (≤ pageCount when known) for every range.
 * Ranges are never clamped.
 *
 * @throws InvalidArgumentError naming the first offending range.
 */
export function validatePageRanges(ranges: readonly PageRange[], pageCount?: number): void {
  if (ranges.length === 0) {
    throw new InvalidArgumentError('At least one page range is required');
  }

  for (const range of ranges) {
    const { start, end } = range;
    if (!Number.isInteger(start) || !Number.isInteger(end)) {
      throw new InvalidArgumentError(`Page numbers must be integers (got ${start}-${end})`);
    }
    if (start < 1 || end < 1) {
      throw new InvalidArgumentError(`Page numbers must be positive (got "${formatPageRange(range)}")`);
    }
    if (start > end) {
      throw new InvalidArgumentError(`Invalid range "${start}-${end}" — start must be <= end`);
    }
    if (pageCount !== undefined && end > pageCount) {
      throw new InvalidArgumentError(
        `Range "${formatPageRange(range)}" exceeds page count (${pageCount} pages)`,
      );
    }
  }
}

/** @throws InvalidArgumentError unless `parts` is an integer ≥ 1. */
export function validatePartCount(parts: number): void {
  if (!Number.isInteger(parts) || parts < 1) {
    throw new InvalidArgumentError(`Part count must be a positive integer (got ${parts})`);
  }
}

/**
 * Divide `totalPages` into at most `parts` contiguous parts of
 * ceil(totalPages / parts) pages. Stops at the first part that would start
 * past the last page, so fewer parts come back when totalPages < parts.
 * Sequence numbers are the part index + 1.
 */
export function equalPartition(totalPages: number, parts: number): PlannedPart[] {
  validatePartCount(parts);

  const pagesPerPart = Math.ceil(totalPages / parts);
  const planned: PlannedPart[] = [];

  for (let i = 0; i < parts; i++) {
    const start = i * pagesPerPart + 1;
    const end = Math.min((i + 1) * pagesPerPart, totalPages);
    if (start > totalPages) break;
    planned.push({ sequence: i + 1, start, end });
  }

  return planned;
}
