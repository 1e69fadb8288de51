/**
 * Split engine: 1 source PDF → N output PDFs.
 *
 * Three partitionings share one envelope: validate arguments, check the source
 * exists, ensure the output folder, open the source once, write each part to
 * `outputFolder/<pattern with [N] rendered>`, release the source.
 *
 * Each part gets its own output document, released right after its save.
 * A part that fails to copy or save is recorded and skipped; the split itself
 * only fails on a batch-level precondition (bad arguments, missing source,
 * unusable output folder, unreadable source) or on cancellation.
 *
 * Re-running into the same folder overwrites same-named files; parts left over
 * from an earlier run with more parts are not removed.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { basename, join } from 'node:path';
import { HandleScope, pdfLibBackend } from './document.js';
import type { DocumentBackend, SourceDocument } from './document.js';
import {
  CancelledError,
  FolioError,
  InvalidArgumentError,
  NotFoundError,
  PdfOpenError,
  toErrorMessage,
} from './errors.js';
import { hasPlaceholder, renderOutputName, SEQUENCE_PLACEHOLDER } from './naming.js';
import { monotonicProgress, percentOf, silentProgress } from './progress.js';
import { equalPartition, formatPageRange, pageIndicesOf, validatePageRanges, validatePartCount } from './ranges.js';
import { summarize } from './outcome.js';
import { createConsoleLogger } from '../logger.js';
import type {
  EngineOptions,
  ItemOutcome,
  PageRange,
  PartitionSpec,
  PlannedPart,
  SplitOutcome,
} from './types.js';

export interface SplitOptions extends EngineOptions {
  backend?: DocumentBackend;
}

/** One output file per range, numbered by the range's position (1-based). */
export function splitByRanges(
  sourcePath: string,
  ranges: readonly PageRange[],
  outputFolder: string,
  namingPattern: string,
  opts: SplitOptions = {},
): Promise<SplitOutcome> {
  return splitPdf(sourcePath, { kind: 'ranges', ranges: [...ranges] }, outputFolder, namingPattern, opts);
}

/** One output file per page, numbered by page number. */
export function splitByPage(
  sourcePath: string,
  outputFolder: string,
  namingPattern: string,
  opts: SplitOptions = {},
): Promise<SplitOutcome> {
  return splitPdf(sourcePath, { kind: 'single-page' }, outputFolder, namingPattern, opts);
}

/**
 * Up to `parts` outputs of ceil(pages / parts) pages each. Parts that would
 * start past the last page are not produced, so numbering may stop early.
 */
export function splitEqually(
  sourcePath: string,
  parts: number,
  outputFolder: string,
  namingPattern: string,
  opts: SplitOptions = {},
): Promise<SplitOutcome> {
  return splitPdf(sourcePath, { kind: 'equal', parts }, outputFolder, namingPattern, opts);
}

/** Validate the parts of a split that need no I/O. */
function validateArguments(spec: PartitionSpec, namingPattern: string): void {
  if (!hasPlaceholder(namingPattern)) {
    throw new InvalidArgumentError(`Naming pattern "${namingPattern}" must contain ${SEQUENCE_PLACEHOLDER}`);
  }
  switch (spec.kind) {
    case 'ranges':
      validatePageRanges(spec.ranges);
      break;
    case 'equal':
      validatePartCount(spec.parts);
      break;
    case 'single-page':
      break;
  }
}

interface Plan {
  parts: PlannedPart[];
  /** Number of outputs the partition asks for. */
  requested: number;
  /** Denominator for progress. */
  progressTotal: number;
}

function planParts(spec: PartitionSpec, pageCount: number): Plan {
  switch (spec.kind) {
    case 'ranges':
      validatePageRanges(spec.ranges, pageCount);
      return {
        parts: spec.ranges.map((range, i) => ({ sequence: i + 1, start: range.start, end: range.end })),
        requested: spec.ranges.length,
        progressTotal: spec.ranges.length,
      };
    case 'single-page':
      return {
        parts: Array.from({ length: pageCount }, (_, i) => ({ sequence: i + 1, start: i + 1, end: i + 1 })),
        requested: pageCount,
        progressTotal: pageCount,
      };
    case 'equal':
      return {
        parts: equalPartition(pageCount, spec.parts),
        requested: spec.parts,
        progressTotal: spec.parts,
      };
  }
}

/** Split `sourcePath` according to the partition in `spec`. */
export async function splitPdf(
  sourcePath: string,
  spec: PartitionSpec,
  outputFolder: string,
  namingPattern: string,
  opts: SplitOptions = {},
): Promise<SplitOutcome> {
  const logger = opts.logger ?? createConsoleLogger();
  const progress = monotonicProgress(opts.progress ?? silentProgress);
  const items: ItemOutcome[] = [];
  const state = { sourcePageCount: 0, requested: 0, produced: 0 };

  const outcome = (success: boolean, error?: FolioError): SplitOutcome => ({
    success,
    sourcePath,
    outputFolder,
    ...state,
    items,
    summary: summarize(items),
    ...(error && { error }),
  });
  const fail = (error: FolioError): SplitOutcome => {
    logger.error(error.message);
    return outcome(false, error);
  };

  try {
    validateArguments(spec, namingPattern);
  } catch (err) {
    if (err instanceof FolioError) return fail(err);
    throw err;
  }

  if (!existsSync(sourcePath)) {
    return fail(new NotFoundError(sourcePath, `Source file not found: ${sourcePath}`));
  }

  try {
    mkdirSync(outputFolder, { recursive: true });
  } catch (err) {
    return fail(new NotFoundError(
      outputFolder,
      `Cannot create output folder "${outputFolder}": ${toErrorMessage(err)}`,
      { cause: err },
    ));
  }

  const scope = new HandleScope(opts.backend ?? pdfLibBackend, logger);
  try {
    let source: SourceDocument;
    try {
      source = await scope.open(sourcePath);
    } catch (err) {
      return fail(err instanceof PdfOpenError
        ? err
        : new PdfOpenError(sourcePath, `Cannot open "${sourcePath}": ${toErrorMessage(err)}`, { cause: err }));
    }
    state.sourcePageCount = source.pageCount;

    let plan: Plan;
    try {
      plan = planParts(spec, source.pageCount);
    } catch (err) {
      if (err instanceof FolioError) return fail(err);
      throw err;
    }
    state.requested = plan.requested;

    logger.debug(
      `Splitting ${basename(sourcePath)} (${source.pageCount} pages) → ${plan.parts.length} file(s) in ${outputFolder}`,
    );

    for (let i = 0; i < plan.parts.length; i++) {
      if (opts.signal?.aborted) {
        return fail(new CancelledError(`Split cancelled after ${i} of ${plan.parts.length} part(s)`));
      }

      const part = plan.parts[i];
      const label = formatPageRange(part);
      const fileName = renderOutputName(namingPattern, part.sequence);
      const outputPath = join(outputFolder, fileName);
      const tag = `[${part.sequence}/${plan.progressTotal}] ${fileName}`;

      try {
        const output = await scope.create();
        try {
          await output.copyPages(source, pageIndicesOf(part));
          await output.save(outputPath);
        } finally {
          scope.close(output);
        }
        state.produced++;
        logger.debug(`${tag}: pages ${label}`);
        items.push({ index: i, label, status: 'ok', pageCount: part.end - part.start + 1, outputPath });
      } catch (err) {
        const message = toErrorMessage(err);
        logger.warn(`${tag}: ${message}, skipped`);
        items.push({ index: i, label, status: 'failed', pageCount: 0, outputPath, error: message });
      }

      progress.report(percentOf(part.sequence, plan.progressTotal));
    }

    return outcome(true);
  } finally {
    scope.release();
  }
}
