/**
 * @guji-convert/cli - command line front end for the guji → guji-digital converter
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { convertCommand } from './commands/convert.js';
import { inspectCommand } from './commands/inspect.js';

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));

const program = new Command();

program
  .name('guji-convert')
  .description('Convert semantic-mode guji documents to guji-digital layout')
  .version(pkg.version);

program.addCommand(convertCommand);
program.addCommand(inspectCommand);

await program.parseAsync();
