/**
 * Merge engine: N source PDFs → 1 output PDF.
 *
 * Sources are processed in the given order; that order, then page order within
 * each source, is the page order of the output. A missing or unreadable source
 * is skipped and recorded; the merge fails only when no page was copied, when
 * the save fails, or when it is cancelled. Copied sources stay open until the
 * output is saved.
 */

import { existsSync } from 'node:fs';
import { basename } from 'node:path';
import { HandleScope, pdfLibBackend } from './document.js';
import type { DocumentBackend } from './document.js';
import {
  CancelledError,
  FolioError,
  InvalidArgumentError,
  NoPagesError,
  PdfSaveError,
  toErrorMessage,
} from './errors.js';
import { monotonicProgress, percentOf, silentProgress } from './progress.js';
import { pageIndicesOf } from './ranges.js';
import { createConsoleLogger } from '../logger.js';
import type { EngineOptions, ItemOutcome, MergeOutcome } from './types.js';
import { summarize } from './outcome.js';

export interface MergeOptions extends EngineOptions {
  backend?: DocumentBackend;
}

/**
 * Merge `sourcePaths` (in order) into a single PDF at `outputPath`.
 * Expected failures resolve with `success: false` and `error` set; anything
 * else (e.g. a throwing progress sink) propagates after handles are released.
 */
export async function mergePdfs(
  sourcePaths: readonly string[],
  outputPath: string,
  opts: MergeOptions = {},
): Promise<MergeOutcome> {
  const logger = opts.logger ?? createConsoleLogger();
  const progress = monotonicProgress(opts.progress ?? silentProgress);
  const items: ItemOutcome[] = [];

  const fail = (error: FolioError): MergeOutcome => {
    logger.error(error.message);
    return { success: false, outputPath, totalPages: 0, items, summary: summarize(items), error };
  };

  if (sourcePaths.length === 0) {
    return fail(new InvalidArgumentError('No source files to merge'));
  }

  logger.debug(`Merging ${sourcePaths.length} file(s) → ${outputPath}`);
  const scope = new HandleScope(opts.backend ?? pdfLibBackend, logger);

  try {
    const output = await scope.create();

    for (let i = 0; i < sourcePaths.length; i++) {
      if (opts.signal?.aborted) {
        return fail(new CancelledError(`Merge cancelled after ${i} of ${sourcePaths.length} file(s)`));
      }

      const sourcePath = sourcePaths[i];
      const tag = `[${i + 1}/${sourcePaths.length}] ${basename(sourcePath)}`;

      if (!existsSync(sourcePath)) {
        logger.warn(`${tag}: file not found, skipped`);
        items.push({ index: i, label: sourcePath, status: 'skipped', pageCount: 0, error: 'File not found' });
        progress.report(percentOf(i + 1, sourcePaths.length));
        continue;
      }

      let copied = 0;
      try {
        const source = await scope.open(sourcePath);
        const before = output.pageCount;
        try {
          await output.copyPages(source, pageIndicesOf({ start: 1, end: source.pageCount }));
        } catch (err) {
          // Pages already appended from this source stay in the output.
          scope.close(source);
          throw err;
        } finally {
          copied = output.pageCount - before;
        }
        logger.debug(`${tag}: ${copied} page(s) copied`);
        items.push({ index: i, label: sourcePath, status: 'ok', pageCount: copied });
      } catch (err) {
        const message = toErrorMessage(err);
        logger.warn(`${tag}: ${message}, skipped`);
        items.push({ index: i, label: sourcePath, status: 'failed', pageCount: copied, error: message });
      }

      progress.report(percentOf(i + 1, sourcePaths.length));
    }

    if (output.pageCount === 0) {
      return fail(new NoPagesError());
    }

    if (opts.signal?.aborted) {
      return fail(new CancelledError('Merge cancelled before saving'));
    }

    try {
      await output.save(outputPath);
    } catch (err) {
      return fail(err instanceof PdfSaveError
        ? err
        : new PdfSaveError(outputPath, `Failed to save "${outputPath}": ${toErrorMessage(err)}`, { cause: err }));
    }

    const totalPages = output.pageCount;
    logger.debug(`Saved ${totalPages} page(s) to ${outputPath}`);
    return { success: true, outputPath, totalPages, items, summary: summarize(items) };
  } finally {
    scope.release();
  }
}
