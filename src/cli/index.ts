/**
 * CLI entry: builds the command tree.
 */
import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createGenerateCommand } from './commands/generate.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Nearest package.json above `start`; sources and dist sit at different depths. */
function findPackageJson(start: string): string | undefined {
  let dir = start;
  for (;;) {
    const candidate = resolve(dir, 'package.json');
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

function readVersion(): string {
  const file = findPackageJson(__dirname);
  if (file === undefined) return '0.0.0';
  const pkg: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('bridgegen')
    .description('Generate cross-language bridge code from interface declarations')
    .version(readVersion());
  [createGenerateCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
