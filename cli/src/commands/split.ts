import chalk from 'chalk';
import { basename, dirname, resolve } from 'node:path';
import { Command } from 'commander';
import {
  defaultNamingPattern,
  hasPlaceholder,
  inspectPdf,
  parsePageRanges,
  SEQUENCE_PLACEHOLDER,
  splitPdf,
} from '../core/pdf/index.js';
import type { PartitionSpec } from '../core/pdf/index.js';
import { cliAction, outcomeToJson, printItemReport, terminalProgress } from './action.js';
import type { CommandContext, OutputFlags } from './action.js';
import { parsePositiveInt } from './parsers.js';

interface SplitFlags extends OutputFlags {
  ranges?: string;
  eachPage?: boolean;
  parts?: number;
  outDir?: string;
  pattern?: string;
}

/** Smallest part count accepted from the command line. */
const MIN_PARTS = 2;

export function registerSplitCommand(program: Command): void {
  program
    .command('split')
    .description('Split a PDF into several files')
    .argument('<file>', 'Source PDF')
    .option('--ranges <list>', 'One file per page range, e.g. "1-3, 4-7, 8"')
    .option('--each-page', 'One file per page')
    .option('--parts <n>', `Split into n files of equal page count (n >= ${MIN_PARTS})`, parsePositiveInt)
    .option('--out-dir <dir>', 'Output folder (default: the source file\'s folder)')
    .option('--pattern <template>', `File name pattern containing ${SEQUENCE_PLACEHOLDER} (default: <name>_${SEQUENCE_PLACEHOLDER}.pdf)`)
    .option('-q, --quiet', 'Only print errors')
    .option('--json', 'Output as JSON')
    .action(cliAction(async (ctx: CommandContext, file: string, opts: SplitFlags) => {
      const modes = [opts.ranges !== undefined, opts.eachPage === true, opts.parts !== undefined]
        .filter(Boolean).length;
      if (modes !== 1) {
        console.error(chalk.red('Error: choose exactly one of --ranges, --each-page, --parts'));
        process.exit(1);
      }

      const sourcePath = resolve(file);
      const outputFolder = resolve(opts.outDir ?? dirname(sourcePath));
      const pattern = opts.pattern ?? ctx.config.namingPattern ?? defaultNamingPattern(sourcePath);

      if (!hasPlaceholder(pattern)) {
        console.error(chalk.red(`Error: --pattern must contain ${SEQUENCE_PLACEHOLDER} (got "${pattern}")`));
        process.exit(1);
      }

      let spec: PartitionSpec;
      if (opts.ranges !== undefined) {
        // Ranges are checked against the real page count before anything is written
        const info = await inspectPdf(sourcePath);
        spec = { kind: 'ranges', ranges: parsePageRanges(opts.ranges, info.pageCount) };
      } else if (opts.parts !== undefined) {
        if (opts.parts < MIN_PARTS) {
          console.error(chalk.red(`Error: --parts must be at least ${MIN_PARTS}`));
          process.exit(1);
        }
        spec = { kind: 'equal', parts: opts.parts };
      } else {
        spec = { kind: 'single-page' };
      }

      const progress = terminalProgress(`Splitting ${basename(sourcePath)}`, opts);
      const outcome = await splitPdf(sourcePath, spec, outputFolder, pattern, {
        progress,
        logger: ctx.logger,
        signal: ctx.signal,
      });
      progress.done();

      if (opts.json) {
        console.log(JSON.stringify(outcomeToJson(outcome), null, 2));
      } else if (!opts.quiet) {
        if (outcome.success) {
          console.log(chalk.green(`Wrote ${outcome.produced} file(s) to ${outcome.outputFolder}`));
          for (const item of outcome.items) {
            if (item.status === 'ok' && item.outputPath) {
              console.log(chalk.dim(`  ${basename(item.outputPath)}  pages ${item.label}`));
            }
          }
          if (outcome.produced < outcome.requested && spec.kind === 'equal') {
            console.log(chalk.yellow(
              `  Only ${outcome.produced} of ${outcome.requested} parts: the document has ${outcome.sourcePageCount} page(s)`,
            ));
          }
        }
        if (outcome.summary.failed > 0 || !outcome.success) printItemReport(outcome);
      }

      if (!outcome.success) process.exit(1);
    }, (_file, opts) => opts));
}
