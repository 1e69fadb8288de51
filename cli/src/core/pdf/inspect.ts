/**
 * Read-only PDF inspection: page count, page labels, outline size.
 *
 * Uses pdfjs-dist (pure JS, no canvas) — structure only, nothing is rendered.
 */

// pdfjs-dist legacy build for Node.js (no canvas requirement)
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { readFileSync, statSync } from 'node:fs';
import { PdfOpenError, toErrorMessage } from './errors.js';
import type { PdfInfo } from './types.js';

/**
 * Check if a PDF buffer is encrypted.
 *
 * Looks for the `/Encrypt` entry in the trailer, present in every encrypted
 * PDF regardless of algorithm. latin1 gives a 1:1 byte→char mapping.
 */
export function isPdfEncrypted(buffer: Buffer): boolean {
  if (buffer.length < 5) return false;

  const header = buffer.subarray(0, 5).toString('ascii');
  if (header !== '%PDF-') return false;

  return buffer.toString('latin1').includes('/Encrypt');
}

/**
 * Inspect a PDF on disk.
 *
 * @throws PdfOpenError if the file is missing, encrypted or not a PDF.
 */
export async function inspectPdf(path: string): Promise<PdfInfo> {
  let buffer: Buffer;
  try {
    buffer = readFileSync(path);
  } catch (err) {
    throw new PdfOpenError(path, `Cannot read "${path}": ${toErrorMessage(err)}`, { cause: err });
  }

  if (isPdfEncrypted(buffer)) {
    throw new PdfOpenError(path, `"${path}" is encrypted; encrypted PDFs are not supported`);
  }

  let doc: Awaited<ReturnType<typeof getDocument>['promise']>;
  try {
    doc = await getDocument({
      // pdfjs may transfer the buffer it is given; hand it a copy
      data: new Uint8Array(buffer),
      isEvalSupported: false,
      verbosity: 0,
    }).promise;
  } catch (err) {
    throw new PdfOpenError(path, `Not a readable PDF "${path}": ${toErrorMessage(err)}`, { cause: err });
  }

  try {
    const pageLabels = await readPageLabels(doc);
    const outline = await doc.getOutline().catch(() => null);

    return {
      path,
      fileSize: statSync(path).size,
      pageCount: doc.numPages,
      pageLabels,
      outlineCount: outline?.length ?? 0,
    };
  } finally {
    await doc.destroy();
  }
}

/** Page labels, or null when the document defines none. */
async function readPageLabels(
  doc: { getPageLabels(): Promise<string[] | null> },
): Promise<string[] | null> {
  try {
    return await doc.getPageLabels();
  } catch {
    return null; // malformed /PageLabels tree
  }
}
