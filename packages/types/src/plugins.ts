/**
 * Plugin Types - capability set consulted by the parser, layouter and generator
 */

import type { SemanticBlock, Segment } from './blocks.js';

// === LOG LEVEL ===
/**
 * Log level for controlling verbosity.
 * Levels are ordered by verbosity: silent < errors < warnings < info < debug
 */
export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

// === LOGGER INTERFACE ===
/**
 * Logger interface for structured logging.
 * Plugins should use context.logger instead of console.log for controllable output.
 */
export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
}

// === PLUGIN METADATA ===
export interface PluginMetadata {
  name: string;
  /** Source-dialect commands handled by parseCommand, for diagnostics */
  commands?: string[];
}

// === PARSE CONTEXT ===
/**
 * What parseCommand sees besides the current line.
 * `lines[index]` is the line being parsed; multi-line commands read forward from there.
 */
export interface ParseContext {
  lines: readonly string[];
  index: number;
  gridWidth: number;
  logger?: Logger;
}

// === PARSED COMMAND ===
export interface ParsedCommand {
  blocks: SemanticBlock[];
  /** Source lines consumed, starting at context.index. Treated as at least 1. */
  consumedLines: number;
}

/** guji template name -> guji-digital template name */
export type TemplateMapping = Record<string, string>;

// === PLUGIN CAPABILITY SET ===
export interface ConverterPlugin {
  readonly metadata: PluginMetadata;

  getTemplateMapping(): TemplateMapping;

  /** Returns the rewritten line, or null to leave it to the core */
  preprocessLine(line: string): string | null;

  /** Returns null when the command is not recognized */
  parseCommand(name: string, line: string, context: ParseContext): ParsedCommand | null;

  /** Splits annotation text at elevation commands; deltas are relative to baseIndent */
  expandInJiazhu(text: string, baseIndent?: number): Segment[];

  /** Runs once, between parsing and layout */
  postprocessBlocks(blocks: SemanticBlock[]): SemanticBlock[];
}
