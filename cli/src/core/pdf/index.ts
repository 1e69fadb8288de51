/**
 * PDF merging and splitting.
 *
 * Usage:
 *   import { mergePdfs, splitByRanges, parsePageRanges, ... } from '../core/pdf/index.js';
 */

export { mergePdfs } from './merge.js';
export type { MergeOptions } from './merge.js';
export { splitPdf, splitByRanges, splitByPage, splitEqually } from './split.js';
export type { SplitOptions } from './split.js';
export { inspectPdf, isPdfEncrypted } from './inspect.js';
export { pdfLibBackend, HandleScope } from './document.js';
export type { DocumentBackend, DocumentHandle, OutputDocument, SourceDocument } from './document.js';
export { parsePageRanges, validatePageRanges, validatePartCount, equalPartition, formatPageRange, pageIndicesOf } from './ranges.js';
export { SEQUENCE_PLACEHOLDER, hasPlaceholder, renderOutputName, defaultNamingPattern } from './naming.js';
export { silentProgress, callbackProgress, monotonicProgress, percentOf } from './progress.js';
export type { ProgressSink } from './progress.js';
export { summarize } from './outcome.js';
export {
  FolioError,
  PdfOpenError,
  PdfSaveError,
  InvalidArgumentError,
  NoPagesError,
  NotFoundError,
  CancelledError,
  toErrorMessage,
} from './errors.js';
export type { FolioErrorCode } from './errors.js';
export type {
  PageRange,
  PartitionSpec,
  PlannedPart,
  EngineOptions,
  ItemStatus,
  ItemOutcome,
  BatchSummary,
  BatchOutcome,
  MergeOutcome,
  SplitOutcome,
  PdfInfo,
} from './types.js';
