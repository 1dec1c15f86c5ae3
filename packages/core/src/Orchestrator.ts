/**
 * Orchestrator - runs parse → layout → generate for one document
 *
 * Holds no state between convert() calls; the plugin is handed in by the caller.
 */

import type { BlockType, Column, ConverterPlugin, Logger, LogLevel, SemanticBlock } from '@guji-convert/types';
import { DEFAULT_GRID_WIDTH } from './constants.js';
import { Generator } from './generator/Generator.js';
import { Layouter } from './layout/Layouter.js';
import { createLogger } from './logging/Logger.js';
import { Parser } from './parser/Parser.js';

export interface OrchestratorOptions {
  plugin?: ConverterPlugin;
  gridWidth?: number;
  logger?: Logger;
  /** Used only when no logger is given */
  logLevel?: LogLevel;
  templateMap?: Record<string, string>;
  removedPackages?: string[];
}

export interface ConversionResult {
  output: string;
  blocks: SemanticBlock[];
  columns: Column[];
  /** Block counts keyed by type, in type order */
  blockCounts: Partial<Record<BlockType, number>>;
}

export function countBlocks(blocks: readonly SemanticBlock[]): Partial<Record<BlockType, number>> {
  const counts = new Map<BlockType, number>();
  for (const block of blocks) {
    counts.set(block.type, (counts.get(block.type) ?? 0) + 1);
  }
  const sorted: Partial<Record<BlockType, number>> = {};
  for (const type of [...counts.keys()].sort()) {
    sorted[type] = counts.get(type);
  }
  return sorted;
}

export class Orchestrator {
  private readonly parser: Parser;
  private readonly layouter: Layouter;
  private readonly generator: Generator;
  private readonly logger: Logger;
  private readonly gridWidth: number;

  constructor(options: OrchestratorOptions = {}) {
    this.gridWidth = options.gridWidth ?? DEFAULT_GRID_WIDTH;
    this.logger = options.logger ?? createLogger(options.logLevel ?? 'info');

    this.parser = new Parser({ plugin: options.plugin, gridWidth: this.gridWidth, logger: this.logger });
    this.layouter = new Layouter({ gridWidth: this.gridWidth, logger: this.logger });
    this.generator = new Generator({
      plugin: options.plugin,
      templateMap: options.templateMap,
      removedPackages: options.removedPackages,
      logger: this.logger,
    });

    if (options.plugin) {
      this.logger.info('Using plugin', { plugin: options.plugin.metadata.name });
    }
  }

  convert(content: string): ConversionResult {
    this.logger.info('Read input', { chars: content.length });

    const document = this.parser.parse(content);
    const blockCounts = countBlocks(document.blocks);
    this.logger.info(`Stage 1 complete: ${document.blocks.length} semantic blocks`);
    for (const [type, count] of Object.entries(blockCounts)) {
      this.logger.info(`  ${type}: ${count}`);
    }

    const columns = this.layouter.layout(document.blocks);
    this.logger.info(`Stage 2 complete: ${columns.length} columns`, { gridWidth: this.gridWidth });

    const output = this.generator.generate(document.preamble, document.preserved, columns, document.footer);
    this.logger.info(`Stage 3 complete: ${output.length} characters`);

    return { output, blocks: document.blocks, columns, blockCounts };
  }
}
