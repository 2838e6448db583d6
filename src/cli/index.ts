import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createExactCommand } from './commands/exact.js';
import { createShapesCommand } from './commands/shapes.js';
import { createEscapeCommand } from './commands/escape.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('templatize')
    .description('Convert existing projects into templates by rewriting tokens into placeholders')
    .version(readVersion());
  [createExactCommand, createShapesCommand, createEscapeCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
