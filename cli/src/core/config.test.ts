import { describe, it, expect } from 'vitest';
import { resolveConfig } from './config.js';

describe('resolveConfig', () => {
  it('uses defaults with an empty environment', () => {
    expect(resolveConfig({})).toEqual({ logLevel: 'info', assumeYes: false });
  });

  it('reads the log level case-insensitively', () => {
    expect(resolveConfig({ FOLIO_LOG_LEVEL: ' DEBUG ' }).logLevel).toBe('debug');
  });

  it('falls back to info for an unknown log level', () => {
    expect(resolveConfig({ FOLIO_LOG_LEVEL: 'chatty' }).logLevel).toBe('info');
  });

  it('takes a naming pattern only when it has the placeholder', () => {
    expect(resolveConfig({ FOLIO_NAMING_PATTERN: 'part-[N].pdf' }).namingPattern).toBe('part-[N].pdf');
    expect(resolveConfig({ FOLIO_NAMING_PATTERN: 'part.pdf' })).not.toHaveProperty('namingPattern');
  });

  it('parses FOLIO_ASSUME_YES', () => {
    expect(resolveConfig({ FOLIO_ASSUME_YES: '1' }).assumeYes).toBe(true);
    expect(resolveConfig({ FOLIO_ASSUME_YES: 'TRUE' }).assumeYes).toBe(true);
    expect(resolveConfig({ FOLIO_ASSUME_YES: 'no' }).assumeYes).toBe(false);
  });
});
