import chalk from 'chalk';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { createConsoleLogger, isLogLevel, silentLogger } from './logger.js';
import type { LogLevel } from './logger.js';

let savedLevel: typeof chalk.level;

beforeAll(() => {
  savedLevel = chalk.level;
  chalk.level = 0;
});

afterAll(() => {
  chalk.level = savedLevel;
});

function capture(level?: LogLevel) {
  const lines: string[] = [];
  const logger = createConsoleLogger({ level, write: (line) => lines.push(line) });
  return { logger, lines };
}

describe('createConsoleLogger', () => {
  it('prefixes warnings and errors and ends every line with a newline', () => {
    const { logger, lines } = capture('debug');
    logger.debug('copying');
    logger.info('done');
    logger.warn('skipped a.pdf');
    logger.error('disk full');
    expect(lines).toEqual(['copying\n', 'done\n', 'Warning: skipped a.pdf\n', 'Error: disk full\n']);
  });

  it('drops messages below the threshold', () => {
    const { logger, lines } = capture('warn');
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    expect(lines).toEqual(['Warning: c\n']);
  });

  it('defaults to info', () => {
    const { logger, lines } = capture();
    logger.debug('hidden');
    logger.info('shown');
    expect(lines).toEqual(['shown\n']);
  });

  it('prints nothing at silent', () => {
    const { logger, lines } = capture('silent');
    logger.error('nope');
    expect(lines).toEqual([]);
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

describe('silentLogger', () => {
  it('accepts every level without throwing', () => {
    expect(() => silentLogger.error('ignored')).not.toThrow();
  });
});
