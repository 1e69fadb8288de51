/**
 * Console logger. Diagnostics go to stderr so stdout stays clean for --json.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Defaults to process.stderr. */
  write?: (line: string) => void;
}

export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(opts.level ?? 'info');
  const write = opts.write ?? ((line: string) => { process.stderr.write(line); });

  const emit = (level: Exclude<LogLevel, 'silent'>, text: string): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    write(`${text}\n`);
  };

  return {
    debug: (message) => emit('debug', chalk.dim(message)),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', chalk.yellow(`Warning: ${message}`)),
    error: (message) => emit('error', chalk.red(`Error: ${message}`)),
  };
}

export const silentLogger: Logger = createConsoleLogger({ level: 'silent' });
