import { describe, it, expect } from 'vitest';
import { defaultNamingPattern, hasPlaceholder, renderOutputName } from './naming.js';

describe('renderOutputName', () => {
  it('pads the sequence number to three digits', () => {
    expect(renderOutputName('doc_[N].pdf', 7)).toBe('doc_007.pdf');
    expect(renderOutputName('doc_[N].pdf', 42)).toBe('doc_042.pdf');
  });

  it('treats three digits as a minimum width, not a maximum', () => {
    expect(renderOutputName('doc_[N].pdf', 1000)).toBe('doc_1000.pdf');
    expect(renderOutputName('doc_[N].pdf', 1234)).toBe('doc_1234.pdf');
  });

  it('replaces every placeholder occurrence', () => {
    expect(renderOutputName('[N]/part-[N].pdf', 3)).toBe('003/part-003.pdf');
  });

  it('leaves a pattern without placeholder unchanged', () => {
    expect(renderOutputName('fixed.pdf', 5)).toBe('fixed.pdf');
  });
});

describe('hasPlaceholder', () => {
  it('detects the [N] token', () => {
    expect(hasPlaceholder('invoice_[N].pdf')).toBe(true);
    expect(hasPlaceholder('invoice_N.pdf')).toBe(false);
    expect(hasPlaceholder('invoice_[n].pdf')).toBe(false);
  });
});

describe('defaultNamingPattern', () => {
  it('derives <basename>_[N].pdf from the source path', () => {
    expect(defaultNamingPattern('/scans/contract.pdf')).toBe('contract_[N].pdf');
    expect(defaultNamingPattern('report.final.PDF')).toBe('report.final_[N].pdf');
  });
});
