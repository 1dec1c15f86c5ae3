/**
 * Convert command action - loads config and plugin, runs the Orchestrator,
 * writes the layout-mode document.
 */

import { resolve, dirname } from 'path';
import { readFileSync, writeFileSync, mkdirSync } from 'fs';
import {
  Orchestrator,
  FileAccessError,
  MultiLogger,
  charLength,
  createLogger,
  loadConfig,
  type BlockType,
  type Logger,
} from '@guji-convert/core';
import { resolvePlugin } from '../plugins/pluginLoader.js';
import { describeError, exitWithError } from '../utils/errorFormatter.js';
import { getLogLevel } from '../utils/cliOptions.js';

export interface ConvertOptions {
  output: string;
  plugin?: string;
  gridWidth?: number;
  project?: string;
  quiet?: boolean;
  verbose?: boolean;
  logLevel?: string;
  logFile?: string;
}

export interface ConvertSummary {
  inputPath: string;
  outputPath: string;
  plugin?: string;
  gridWidth: number;
  blockCounts: Partial<Record<BlockType, number>>;
  blocks: number;
  columns: number;
  characters: number;
}

export function readInput(inputPath: string): string {
  try {
    return readFileSync(inputPath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FileAccessError(
      `Cannot read input file: ${inputPath}`,
      'ERR_FILE_UNREADABLE',
      { filePath: inputPath, reason },
      'Check that the file exists and is readable'
    );
  }
}

function writeOutput(outputPath: string, content: string): void {
  try {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, content, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FileAccessError(
      `Cannot write output file: ${outputPath}`,
      'ERR_FILE_UNWRITABLE',
      { filePath: outputPath, reason },
      'Check that the output directory is writable'
    );
  }
}

/**
 * Run one conversion. THROWS ConverterError subclasses; never exits.
 *
 * --plugin paths resolve against the working directory, `plugin:` in
 * config.yaml against the project directory.
 */
export async function runConvert(input: string, options: ConvertOptions, logger: Logger): Promise<ConvertSummary> {
  const projectPath = resolve(options.project ?? '.');
  const config = loadConfig(projectPath, logger);

  const pluginRef = options.plugin ?? config.plugin;
  const plugin = await resolvePlugin(pluginRef, options.plugin ? process.cwd() : projectPath);
  const gridWidth = options.gridWidth ?? config.gridWidth;

  const inputPath = resolve(input);
  const outputPath = resolve(options.output);
  logger.debug('Converting', { inputPath, outputPath, gridWidth });

  const content = readInput(inputPath);
  const orchestrator = new Orchestrator({
    plugin,
    gridWidth,
    logger,
    templateMap: config.templates,
    removedPackages: config.removePackages,
  });
  const result = orchestrator.convert(content);
  writeOutput(outputPath, result.output);

  return {
    inputPath,
    outputPath,
    plugin: plugin?.metadata.name,
    gridWidth,
    blockCounts: result.blockCounts,
    blocks: result.blocks.length,
    columns: result.columns.length,
    characters: charLength(result.output),
  };
}

export function formatSummary(summary: ConvertSummary): string[] {
  const lines = [`Converted ${summary.inputPath} → ${summary.outputPath}`];
  if (summary.plugin) {
    lines.push(`  Plugin: ${summary.plugin}`);
  }
  lines.push(`  Grid width: ${summary.gridWidth}`);
  lines.push(`  Blocks: ${summary.blocks}`);
  for (const [type, count] of Object.entries(summary.blockCounts)) {
    lines.push(`    ${type}: ${count}`);
  }
  lines.push(`  Columns: ${summary.columns}`);
  lines.push(`  Characters: ${summary.characters}`);
  return lines;
}

async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof MultiLogger) {
    await logger.close();
  }
}

export async function convertAction(input: string, options: ConvertOptions): Promise<void> {
  const info = options.quiet ? () => {} : console.log;

  const logFile = options.logFile ? resolve(options.logFile) : undefined;
  let logger: Logger;
  try {
    logger = createLogger(getLogLevel(options), logFile ? { logFile } : undefined);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return exitWithError(message, ['Pass a writable file path to --log-file']);
  }

  let summary: ConvertSummary;
  try {
    summary = await runConvert(input, options, logger);
  } catch (err) {
    logger.error('Conversion failed', { input });
    await closeLogger(logger);
    const { title, nextSteps } = describeError(err);
    return exitWithError(`Conversion failed: ${title}`, nextSteps);
  }

  await closeLogger(logger);
  for (const line of formatSummary(summary)) {
    info(line);
  }
}
