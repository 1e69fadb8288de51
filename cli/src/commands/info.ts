import chalk from 'chalk';
import { basename, resolve } from 'node:path';
import { Command } from 'commander';
import { inspectPdf, toErrorMessage } from '../core/pdf/index.js';
import type { PdfInfo } from '../core/pdf/index.js';
import { cliAction } from './action.js';
import type { CommandContext, OutputFlags } from './action.js';

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function registerInfoCommand(program: Command): void {
  program
    .command('info')
    .description('Show page count and structure of PDF files')
    .argument('<files...>', 'PDF files')
    .option('--json', 'Output as JSON')
    .action(cliAction(async (_ctx: CommandContext, files: string[], opts: OutputFlags) => {
      const results: PdfInfo[] = [];
      const failures: Array<{ path: string; error: string }> = [];

      // Keep going past unreadable files, like the batch engines do
      for (const file of files) {
        const path = resolve(file);
        try {
          results.push(await inspectPdf(path));
        } catch (err) {
          failures.push({ path, error: toErrorMessage(err) });
        }
      }

      if (opts.json) {
        console.log(JSON.stringify({ files: results, failures }, null, 2));
      } else {
        for (const info of results) {
          console.log(chalk.bold(basename(info.path)));
          console.log(`  Pages:    ${info.pageCount}`);
          console.log(`  Size:     ${formatSize(info.fileSize)}`);
          if (info.pageLabels) {
            console.log(`  Labels:   ${info.pageLabels[0]} … ${info.pageLabels[info.pageLabels.length - 1]}`);
          }
          if (info.outlineCount > 0) {
            console.log(`  Outline:  ${info.outlineCount} top-level entr${info.outlineCount === 1 ? 'y' : 'ies'}`);
          }
        }
        for (const f of failures) {
          console.log(chalk.red(`${basename(f.path)}: ${f.error}`));
        }
      }

      if (failures.length > 0) process.exit(1);
    }, (_files, opts) => opts));
}
