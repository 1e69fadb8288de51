/**
 * Document handles over pdf-lib.
 *
 * Sources are read fully into memory before parsing, so no OS handle stays
 * open on the source file. Outputs accumulate copied pages and are written
 * in one shot on save; the write goes straight to the target path, so an
 * interrupted process can leave a partial file behind.
 *
 * Engines acquire handles through a HandleScope, which releases every handle
 * exactly once, outputs before sources.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import { PdfOpenError, PdfSaveError, toErrorMessage } from './errors.js';
import type { Logger } from '../logger.js';

export interface SourceDocument {
  readonly kind: 'source';
  readonly path: string;
  readonly pageCount: number;
  readonly closed: boolean;
  /** Idempotent. */
  close(): void;
}

export interface OutputDocument {
  readonly kind: 'output';
  readonly pageCount: number;
  readonly closed: boolean;
  /**
   * Append structural copies of the 0-based `pageIndices` of `source`, in
   * order. Objects the pages share (fonts, images, embedded streams) are
   * copied once per call, so callers pass every page they need from a source
   * in one call.
   */
  copyPages(source: SourceDocument, pageIndices: readonly number[]): Promise<void>;
  /** Serialize to `path`, creating missing parent directories. */
  save(path: string): Promise<void>;
  /** Idempotent. */
  close(): void;
}

export type DocumentHandle = SourceDocument | OutputDocument;

/** Opens sources and creates outputs; the engines only see this seam. */
export interface DocumentBackend {
  /** @throws PdfOpenError */
  open(path: string): Promise<SourceDocument>;
  create(): Promise<OutputDocument>;
}

// ── pdf-lib implementation ───────────────────────────────────

class PdfLibSource implements SourceDocument {
  readonly kind = 'source';
  private doc: PDFDocument | null;

  constructor(readonly path: string, doc: PDFDocument) {
    this.doc = doc;
  }

  get pageCount(): number {
    return this.document().getPageCount();
  }

  get closed(): boolean {
    return this.doc === null;
  }

  /** @throws Error once closed */
  document(): PDFDocument {
    if (!this.doc) throw new Error(`Source document is closed: ${this.path}`);
    return this.doc;
  }

  close(): void {
    this.doc = null;
  }
}

class PdfLibOutput implements OutputDocument {
  readonly kind = 'output';
  private doc: PDFDocument | null;

  constructor(doc: PDFDocument) {
    this.doc = doc;
  }

  get pageCount(): number {
    return this.document().getPageCount();
  }

  get closed(): boolean {
    return this.doc === null;
  }

  async copyPages(source: SourceDocument, pageIndices: readonly number[]): Promise<void> {
    if (!(source instanceof PdfLibSource)) {
      throw new Error('Source document was not opened by the pdf-lib backend');
    }
    for (const pageIndex of pageIndices) {
      if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= source.pageCount) {
        throw new Error(`Page index ${pageIndex} out of range (0-${source.pageCount - 1})`);
      }
    }

    // One copyPages call shares a single object copier across the batch
    const target = this.document();
    const pages = await target.copyPages(source.document(), [...pageIndices]);
    for (const page of pages) target.addPage(page);
  }

  async save(path: string): Promise<void> {
    const target = this.document();
    try {
      const bytes = await target.save();
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, bytes);
    } catch (err) {
      throw new PdfSaveError(path, `Failed to save "${path}": ${toErrorMessage(err)}`, { cause: err });
    }
  }

  close(): void {
    this.doc = null;
  }

  private document(): PDFDocument {
    if (!this.doc) throw new Error('Output document is closed');
    return this.doc;
  }
}

export const pdfLibBackend: DocumentBackend = {
  async open(path: string): Promise<SourceDocument> {
    let bytes: Buffer;
    try {
      bytes = readFileSync(path);
    } catch (err) {
      throw new PdfOpenError(path, `Cannot read "${path}": ${toErrorMessage(err)}`, { cause: err });
    }

    try {
      const doc = await PDFDocument.load(bytes, { updateMetadata: false });
      return new PdfLibSource(path, doc);
    } catch (err) {
      throw new PdfOpenError(path, `Not a readable PDF "${path}": ${toErrorMessage(err)}`, { cause: err });
    }
  },

  async create(): Promise<OutputDocument> {
    return new PdfLibOutput(await PDFDocument.create());
  },
};

// ── Scoped release ───────────────────────────────────────────

/**
 * Tracks handles acquired during one engine call.
 *
 * `release()` closes every still-open output, then every still-open source,
 * each in acquisition order. A handle closed early (e.g. a failed source) is
 * not closed again. Close failures are logged, never thrown.
 */
export class HandleScope {
  private readonly outputs: OutputDocument[] = [];
  private readonly sources: SourceDocument[] = [];

  constructor(private readonly backend: DocumentBackend, private readonly logger: Logger) {}

  async open(path: string): Promise<SourceDocument> {
    const source = await this.backend.open(path);
    this.sources.push(source);
    return source;
  }

  async create(): Promise<OutputDocument> {
    const output = await this.backend.create();
    this.outputs.push(output);
    return output;
  }

  /** Close one handle now; `release()` will skip it. */
  close(handle: DocumentHandle): void {
    this.closeQuietly(handle);
  }

  release(): void {
    for (const output of this.outputs) this.closeQuietly(output);
    for (const source of this.sources) this.closeQuietly(source);
    this.outputs.length = 0;
    this.sources.length = 0;
  }

  private closeQuietly(handle: DocumentHandle): void {
    if (handle.closed) return;
    try {
      handle.close();
    } catch (err) {
      const what = handle.kind === 'source' ? `source "${handle.path}"` : 'output document';
      this.logger.warn(`Failed to close ${what}: ${toErrorMessage(err)}`);
    }
  }
}
