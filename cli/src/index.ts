#!/usr/bin/env node
import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { registerMergeCommand } from './commands/merge.js';
import { registerSplitCommand } from './commands/split.js';
import { registerInfoCommand } from './commands/info.js';

/** Version from the nearest package.json above this file (source or dist). */
function readVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
  const pkg: unknown = JSON.parse(readFileSync(join(dir, 'package.json'), 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

function buildProgram(): Command {
  const program = new Command();
  program
    .name('folio')
    .description('Merge and split PDF files')
    .version(readVersion());

  registerMergeCommand(program);
  registerSplitCommand(program);
  registerInfoCommand(program);
  return program;
}

await buildProgram().parseAsync(process.argv);
