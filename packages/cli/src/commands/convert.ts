/**
 * Convert command - semantic-mode document in, layout-mode document out
 */

import { Command } from 'commander';
import { convertAction, type ConvertOptions } from './convertAction.js';
import { parseGridWidth } from '../utils/cliOptions.js';

export const convertCommand = new Command('convert')
  .description('Convert a guji document to guji-digital layout')
  .argument('<input>', 'Semantic-mode .tex file')
  .requiredOption('-o, --output <path>', 'Where to write the layout-mode .tex file')
  .option('-p, --plugin <name|path>', 'Built-in plugin name or path to a plugin module')
  .option('-w, --grid-width <n>', 'Character slots per column', parseGridWidth)
  .option('--project <path>', 'Directory holding .guji-convert/config.yaml', '.')
  .option('-q, --quiet', 'Suppress summary output')
  .option('-v, --verbose', 'Show stage-by-stage logging')
  .option('--log-level <level>', 'Set log level (silent, errors, warnings, info, debug)')
  .option('--log-file <path>', 'Write all log output to a file')
  .addHelpText('after', `
Examples:
  guji-convert convert book.tex -o book-digital.tex
  guji-convert convert mulu.tex -o out.tex -p siku-mulu
  guji-convert convert book.tex -o out.tex -w 24 -v
  guji-convert convert book.tex -o out.tex -p ./plugins/myTemplate.ts
`)
  .action(async (input: string, options: ConvertOptions) => {
    await convertAction(input, options);
  });
