/**
 * Test doubles and fixtures for the merge/split engines.
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import { PdfOpenError, PdfSaveError } from './errors.js';
import type { DocumentBackend, OutputDocument, SourceDocument } from './document.js';

// ── Temp dirs and real PDFs ──────────────────────────────────

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'folio-test-'));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Write a PDF whose pages have the given widths (height 800), so page order is observable. */
export async function writeSamplePdf(path: string, pageWidths: readonly number[]): Promise<void> {
  const doc = await PDFDocument.create();
  for (const width of pageWidths) doc.addPage([width, 800]);
  writeFileSync(path, await doc.save());
}

/**
 * Write a PDF of `pageCount` pages that all reference one uncompressed stream
 * of `streamBytes` bytes as an XObject resource.
 */
export async function writeSharedStreamPdf(path: string, pageCount: number, streamBytes: number): Promise<void> {
  const doc = await PDFDocument.create();
  const shared = doc.context.register(doc.context.stream(new Uint8Array(streamBytes).fill(0x41)));
  for (let i = 0; i < pageCount; i++) {
    doc.addPage([600, 800]).node.newXObject('Shared', shared);
  }
  writeFileSync(path, await doc.save());
}

export async function readPageWidths(path: string): Promise<number[]> {
  const doc = await PDFDocument.load(readFileSync(path));
  return doc.getPages().map((page) => page.getWidth());
}

// ── Instrumented fake backend ────────────────────────────────

/** A page as the fake output records it: where it was copied from. */
export interface CopiedPage {
  source: string;
  pageIndex: number;
}

/**
 * In-memory DocumentBackend that counts handles and records events.
 *
 * Sources are declared with `addSource(path, pageCount)`; the engines still
 * check the path on disk, so tests create a placeholder file for it.
 * Closing a handle twice throws, so double release fails the test.
 */
export class FakeBackend implements DocumentBackend {
  readonly events: string[] = [];
  readonly saved = new Map<string, CopiedPage[]>();
  readonly failOpen = new Set<string>();
  /** Output paths whose save throws. */
  readonly failSave = new Set<string>();
  /** "path#pageIndex" entries whose copy throws. */
  readonly failCopy = new Set<string>();
  /** One "path [i,j,...]" entry per copyPages call. */
  readonly copyCalls: string[] = [];

  opened = 0;
  created = 0;
  closed = 0;

  private readonly sources = new Map<string, number>();
  private outputSeq = 0;

  addSource(path: string, pageCount: number): this {
    this.sources.set(path, pageCount);
    return this;
  }

  /** Handles acquired but not yet closed. */
  get openHandles(): number {
    return this.opened + this.created - this.closed;
  }

  async open(path: string): Promise<SourceDocument> {
    const pageCount = this.sources.get(path);
    if (pageCount === undefined || this.failOpen.has(path)) {
      this.events.push(`open-failed ${path}`);
      throw new PdfOpenError(path, `Not a readable PDF "${path}"`);
    }
    this.opened++;
    this.events.push(`open ${path}`);

    let closed = false;
    const backend = this;
    return {
      kind: 'source',
      path,
      pageCount,
      get closed() { return closed; },
      close() {
        if (closed) throw new Error(`source closed twice: ${path}`);
        closed = true;
        backend.closed++;
        backend.events.push(`close ${path}`);
      },
    };
  }

  async create(): Promise<OutputDocument> {
    this.created++;
    const id = `output#${++this.outputSeq}`;
    this.events.push(`create ${id}`);

    const pages: CopiedPage[] = [];
    let closed = false;
    const backend = this;
    return {
      kind: 'output',
      get pageCount() { return pages.length; },
      get closed() { return closed; },
      // Appends page by page, so a failing index keeps the pages before it
      async copyPages(source: SourceDocument, pageIndices: readonly number[]) {
        if (closed || source.closed) throw new Error('copy on a closed handle');
        backend.copyCalls.push(`${source.path} [${pageIndices.join(',')}]`);
        for (const pageIndex of pageIndices) {
          if (backend.failCopy.has(`${source.path}#${pageIndex}`)) {
            throw new Error(`copy failed: ${source.path} page ${pageIndex}`);
          }
          if (pageIndex < 0 || pageIndex >= source.pageCount) {
            throw new Error(`page index ${pageIndex} out of range`);
          }
          pages.push({ source: source.path, pageIndex });
        }
      },
      async save(path: string) {
        if (closed) throw new Error('save on a closed handle');
        if (backend.failSave.has(path)) {
          backend.events.push(`save-failed ${path}`);
          throw new PdfSaveError(path, `Failed to save "${path}": disk full`);
        }
        backend.saved.set(path, [...pages]);
        backend.events.push(`save ${path}`);
      },
      close() {
        if (closed) throw new Error(`output closed twice: ${id}`);
        closed = true;
        backend.closed++;
        backend.events.push(`close ${id}`);
      },
    };
  }
}
