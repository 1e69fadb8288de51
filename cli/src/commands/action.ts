/**
 * Shared plumbing for batch commands: error exit, config-derived logger,
 * progress line, Ctrl-C cancellation, per-item report.
 */

import chalk from 'chalk';
import { resolveConfig } from '../core/config.js';
import type { FolioConfig } from '../core/config.js';
import { createConsoleLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { callbackProgress, silentProgress, toErrorMessage } from '../core/pdf/index.js';
import type { BatchOutcome, ProgressSink } from '../core/pdf/index.js';

export interface OutputFlags {
  json?: boolean;
  quiet?: boolean;
}

export interface CommandContext {
  config: FolioConfig;
  logger: Logger;
  /** Fires on Ctrl-C. */
  signal: AbortSignal;
}

/**
 * Wrap a command body: build the context, turn thrown errors into a red
 * message and exit code 1, detach the SIGINT handler afterwards.
 */
export function cliAction<A extends unknown[]>(
  fn: (ctx: CommandContext, ...args: A) => Promise<void>,
  flagsOf: (...args: A) => OutputFlags,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    const config = resolveConfig();
    const flags = flagsOf(...args);
    const logger = createConsoleLogger({ level: flags.quiet || flags.json ? 'error' : config.logLevel });

    const controller = new AbortController();
    const onSigint = (): void => {
      process.stderr.write(chalk.yellow('\nCancelling after the current file...\n'));
      controller.abort();
    };
    process.once('SIGINT', onSigint);

    try {
      await fn({ config, logger, signal: controller.signal }, ...args);
    } catch (err) {
      console.error(chalk.red(`Error: ${toErrorMessage(err)}`));
      process.exit(1);
    } finally {
      process.removeListener('SIGINT', onSigint);
    }
  };
}

/** Single rewritten "label... NN%" line on a TTY; nothing otherwise. */
export function terminalProgress(label: string, flags: OutputFlags): ProgressSink & { done(): void } {
  if (flags.json || flags.quiet || !process.stderr.isTTY) {
    return { report: silentProgress.report, done() { /* nothing drawn */ } };
  }
  let drawn = false;
  const sink = callbackProgress((percent) => {
    drawn = true;
    process.stderr.write(`\r${chalk.dim(`  ${label}... ${String(percent).padStart(3)}%`)}`);
  });
  return {
    report: sink.report,
    done() {
      if (drawn) process.stderr.write('\n');
    },
  };
}

/** Human-readable per-item report for skipped/failed items plus a tally. */
export function printItemReport(outcome: BatchOutcome): void {
  for (const item of outcome.items) {
    if (item.status === 'skipped') {
      console.log(chalk.yellow(`  skipped  ${item.label}${item.error ? ` — ${item.error}` : ''}`));
    } else if (item.status === 'failed') {
      console.log(chalk.red(`  failed   ${item.label}${item.error ? ` — ${item.error}` : ''}`));
    }
  }
  const { succeeded, skipped, failed } = outcome.summary;
  const parts = [chalk.green(`${succeeded} ok`)];
  if (skipped > 0) parts.push(chalk.yellow(`${skipped} skipped`));
  if (failed > 0) parts.push(chalk.red(`${failed} failed`));
  console.log(chalk.dim('  ') + parts.join(chalk.dim(', ')));
}

/** JSON view of an outcome: errors become { code, message }. */
export function outcomeToJson<T extends BatchOutcome>(outcome: T): Omit<T, 'error'> & {
  error: { code: string; message: string } | null;
} {
  const { error, ...rest } = outcome;
  return { ...rest, error: error ? { code: error.code, message: error.message } : null };
}
