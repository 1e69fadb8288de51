/**
 * Output file naming: "report_[N].pdf" → "report_001.pdf", "report_002.pdf", ...
 */

import { basename, extname } from 'node:path';

/** Placeholder substituted with the part's sequence number. */
export const SEQUENCE_PLACEHOLDER = '[N]';

/** Minimum width of the rendered sequence number. */
const SEQUENCE_WIDTH = 3;

export function hasPlaceholder(pattern: string): boolean {
  return pattern.includes(SEQUENCE_PLACEHOLDER);
}

/**
 * Substitute every placeholder with the zero-padded sequence number.
 * Padding is a minimum width: 7 → "007", 1234 → "1234".
 */
export function renderOutputName(pattern: string, sequence: number): string {
  const rendered = String(sequence).padStart(SEQUENCE_WIDTH, '0');
  return pattern.split(SEQUENCE_PLACEHOLDER).join(rendered);
}

/** "/docs/report.pdf" → "report_[N].pdf" */
export function defaultNamingPattern(sourcePath: string): string {
  const name = basename(sourcePath, extname(sourcePath));
  return `${name}_${SEQUENCE_PLACEHOLDER}.pdf`;
}
