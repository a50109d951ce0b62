import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createFormatCommand } from './commands/format.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  return new Command()
    .name('sexpfmt')
    .description('A code formatter for Scheme, Lisp and any S-expressions')
    .version(readVersion())
    .addCommand(createFormatCommand(), { isDefault: true });
}
