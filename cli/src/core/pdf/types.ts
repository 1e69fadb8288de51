/**
 * Types for PDF merging and splitting.
 */

import type { FolioError } from './errors.js';
import type { Logger } from '../logger.js';
import type { ProgressSink } from './progress.js';

// ── Partitioning ─────────────────────────────────────────────

/** 1-based, inclusive page interval over one source document. */
export interface PageRange {
  start: number;
  end: number;
}

/** How a split divides its source into output files. */
export type PartitionSpec =
  | { kind: 'ranges'; ranges: PageRange[] }
  | { kind: 'single-page' }
  | { kind: 'equal'; parts: number };

/** A range tagged with the sequence number its output file is named with. */
export interface PlannedPart extends PageRange {
  sequence: number;
}

// ── Engine options ───────────────────────────────────────────

export interface EngineOptions {
  /** Receives integer percentages (0–100), never decreasing within one call. */
  progress?: ProgressSink;
  logger?: Logger;
  /** Checked between items; a fired signal stops the batch. */
  signal?: AbortSignal;
}

// ── Outcomes ─────────────────────────────────────────────────

export type ItemStatus = 'ok' | 'skipped' | 'failed';

/** Result for one source (merge) or one produced part (split). */
export interface ItemOutcome {
  /** Zero-based position in the batch. */
  index: number;
  /** Source path (merge) or page range, e.g. "1-4" (split). */
  label: string;
  status: ItemStatus;
  /** Pages copied for this item. */
  pageCount: number;
  /** Written file (split parts only). */
  outputPath?: string;
  error?: string;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
}

export interface BatchOutcome {
  /** False only when a batch-level precondition failed. */
  success: boolean;
  items: ItemOutcome[];
  summary: BatchSummary;
  /** Set when `success` is false. */
  error?: FolioError;
}

export interface MergeOutcome extends BatchOutcome {
  outputPath: string;
  /** Pages in the saved output (0 when nothing was written). */
  totalPages: number;
}

export interface SplitOutcome extends BatchOutcome {
  sourcePath: string;
  outputFolder: string;
  /** Pages in the source (0 when it could not be opened). */
  sourcePageCount: number;
  /** Output files the partition asked for (for equal splits: the part count). */
  requested: number;
  /** Output files actually written. */
  produced: number;
}

// ── Inspection ───────────────────────────────────────────────

export interface PdfInfo {
  path: string;
  fileSize: number;
  pageCount: number;
  /** Page labels when the document defines them. */
  pageLabels: string[] | null;
  /** Number of top-level outline (bookmark) entries. */
  outlineCount: number;
}
