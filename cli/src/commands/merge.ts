import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import { Command } from 'commander';
import prompts from 'prompts';
import { mergePdfs } from '../core/pdf/index.js';
import { cliAction, outcomeToJson, printItemReport, terminalProgress } from './action.js';
import type { CommandContext, OutputFlags } from './action.js';
import { ensurePdfExtension } from './parsers.js';

interface MergeFlags extends OutputFlags {
  output: string;
  force?: boolean;
}

/**
 * Ask before overwriting. Without a TTY there is nobody to ask, so refuse.
 */
async function confirmOverwrite(outputPath: string): Promise<boolean> {
  if (!process.stdin.isTTY) return false;
  const { overwrite } = await prompts({
    type: 'confirm',
    name: 'overwrite',
    message: `${basename(outputPath)} already exists. Overwrite?`,
    initial: false,
  });
  return overwrite === true;
}

export function registerMergeCommand(program: Command): void {
  program
    .command('merge')
    .description('Merge PDF files, in the order given, into one PDF')
    .argument('<files...>', 'Source PDFs (at least two)')
    .requiredOption('-o, --output <path>', 'Output file (".pdf" is appended when missing)')
    .option('-f, --force', 'Overwrite the output file without asking')
    .option('-q, --quiet', 'Only print errors')
    .option('--json', 'Output as JSON')
    .action(cliAction(async (ctx: CommandContext, files: string[], opts: MergeFlags) => {
      if (files.length < 2) {
        console.error(chalk.red('Error: merging needs at least two files'));
        process.exit(1);
      }

      const sourcePaths = files.map((f) => resolve(f));
      const outputPath = resolve(ensurePdfExtension(opts.output));

      if (existsSync(outputPath) && !opts.force && !ctx.config.assumeYes) {
        if (!(await confirmOverwrite(outputPath))) {
          console.error(chalk.red(`Error: ${outputPath} already exists (use --force to overwrite)`));
          process.exit(1);
        }
      }

      const progress = terminalProgress('Merging', opts);
      const outcome = await mergePdfs(sourcePaths, outputPath, {
        progress,
        logger: ctx.logger,
        signal: ctx.signal,
      });
      progress.done();

      if (opts.json) {
        console.log(JSON.stringify(outcomeToJson(outcome), null, 2));
      } else if (outcome.success) {
        if (!opts.quiet) {
          console.log(chalk.green(`Merged ${outcome.summary.succeeded} file(s) → ${outcome.outputPath}`));
          console.log(chalk.bold('Pages:'), outcome.totalPages);
          if (outcome.summary.skipped + outcome.summary.failed > 0) printItemReport(outcome);
        }
      } else if (!opts.quiet) {
        printItemReport(outcome);
      }

      if (!outcome.success) process.exit(1);
    }, (_files, opts) => opts));
}
