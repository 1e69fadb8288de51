import { statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { PDFDocument, PDFName } from 'pdf-lib';
import { inspectPdf, isPdfEncrypted } from './inspect.js';
import { PdfOpenError } from './errors.js';
import { makeTempDir, removeTempDir, writeSamplePdf } from './test-support.js';

let dir: string;

beforeEach(() => {
  dir = makeTempDir();
});

afterEach(() => {
  removeTempDir(dir);
});

describe('isPdfEncrypted', () => {
  it('detects the /Encrypt trailer entry', () => {
    const pdf = Buffer.from('%PDF-1.7\n1 0 obj\n<<>>\nendobj\ntrailer\n<< /Root 1 0 R /Encrypt 2 0 R >>\n');
    expect(isPdfEncrypted(pdf)).toBe(true);
  });

  it('is false for a plain PDF and for non-PDF bytes', () => {
    expect(isPdfEncrypted(Buffer.from('%PDF-1.7\ntrailer\n<< /Root 1 0 R >>\n'))).toBe(false);
    expect(isPdfEncrypted(Buffer.from('hello /Encrypt'))).toBe(false);
    expect(isPdfEncrypted(Buffer.from('%PD'))).toBe(false);
  });
});

describe('inspectPdf', () => {
  it('reports page count and file size', async () => {
    const path = join(dir, 'four.pdf');
    await writeSamplePdf(path, [100, 200, 300, 400]);

    const info = await inspectPdf(path);

    expect(info).toEqual({
      path,
      fileSize: statSync(path).size,
      pageCount: 4,
      pageLabels: null,
      outlineCount: 0,
    });
  });

  it('reads page labels when the document defines them', async () => {
    const doc = await PDFDocument.create();
    for (let i = 0; i < 3; i++) doc.addPage([300, 300]);
    doc.catalog.set(PDFName.of('PageLabels'), doc.context.obj({ Nums: [0, { S: 'r' }] }));
    const path = join(dir, 'roman.pdf');
    writeFileSync(path, await doc.save());

    const info = await inspectPdf(path);

    expect(info.pageLabels).toEqual(['i', 'ii', 'iii']);
  });

  it('rejects a file that is not a PDF', async () => {
    const path = join(dir, 'notes.pdf');
    writeFileSync(path, 'plain text');
    await expect(inspectPdf(path)).rejects.toBeInstanceOf(PdfOpenError);
  });

  it('rejects a missing file', async () => {
    await expect(inspectPdf(join(dir, 'missing.pdf'))).rejects.toThrow('Cannot read');
  });

  it('rejects an encrypted file without parsing it', async () => {
    const path = join(dir, 'locked.pdf');
    writeFileSync(path, '%PDF-1.4\ntrailer\n<< /Encrypt 3 0 R >>\n');
    await expect(inspectPdf(path)).rejects.toThrow('encrypted PDFs are not supported');
  });
});
