import { InvalidArgumentError } from 'commander';

/** Commander option parser for integers ≥ 1. */
export function parsePositiveInt(value: string): number {
  const n = Number(value.trim());
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`Expected a positive integer (got "${value}")`);
  }
  return n;
}

/** "merged" → "merged.pdf"; "Merged.PDF" stays as is. */
export function ensurePdfExtension(fileName: string): string {
  return fileName.toLowerCase().endsWith('.pdf') ? fileName : `${fileName}.pdf`;
}
