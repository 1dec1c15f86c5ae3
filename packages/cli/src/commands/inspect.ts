/**
 * Inspect command - show what the parser and layouter make of a document
 * without writing anything
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { Orchestrator, createLogger, loadConfig } from '@guji-convert/core';
import { resolvePlugin } from '../plugins/pluginLoader.js';
import { describeError, exitWithError } from '../utils/errorFormatter.js';
import { getLogLevel, parseGridWidth } from '../utils/cliOptions.js';
import { readInput } from './convertAction.js';

export interface InspectOptions {
  plugin?: string;
  gridWidth?: number;
  project?: string;
  columns?: boolean;
  json?: boolean;
  logLevel?: string;
}

export async function inspectAction(input: string, options: InspectOptions): Promise<void> {
  const logger = createLogger(getLogLevel(options));

  try {
    const projectPath = resolve(options.project ?? '.');
    const config = loadConfig(projectPath, logger);
    const pluginRef = options.plugin ?? config.plugin;
    const plugin = await resolvePlugin(pluginRef, options.plugin ? process.cwd() : projectPath);

    const orchestrator = new Orchestrator({
      plugin,
      gridWidth: options.gridWidth ?? config.gridWidth,
      logger,
      templateMap: config.templates,
      removedPackages: config.removePackages,
    });
    const result = orchestrator.convert(readInput(resolve(input)));

    if (options.json) {
      const report = options.columns
        ? { blockCounts: result.blockCounts, columns: result.columns }
        : { blockCounts: result.blockCounts };
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    console.log(`Blocks: ${result.blocks.length}`);
    for (const [type, count] of Object.entries(result.blockCounts)) {
      console.log(`  ${type}: ${count}`);
    }
    console.log(`Columns: ${result.columns.length}`);

    if (options.columns) {
      console.log('');
      console.log(JSON.stringify(result.columns, null, 2));
    }
  } catch (err) {
    const { title, nextSteps } = describeError(err);
    exitWithError(`Inspect failed: ${title}`, nextSteps);
  }
}

export const inspectCommand = new Command('inspect')
  .description('Show block counts and column records for a document')
  .argument('<input>', 'Semantic-mode .tex file')
  .option('-p, --plugin <name|path>', 'Built-in plugin name or path to a plugin module')
  .option('-w, --grid-width <n>', 'Character slots per column', parseGridWidth)
  .option('--project <path>', 'Directory holding .guji-convert/config.yaml', '.')
  .option('-c, --columns', 'Also print the column records')
  .option('-j, --json', 'Output as JSON')
  .option('--log-level <level>', 'Set log level (silent, errors, warnings, info, debug)')
  .action(async (input: string, options: InspectOptions) => {
    await inspectAction(input, options);
  });
