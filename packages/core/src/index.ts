/**
 * @guji-convert/core - guji → guji-digital conversion engine
 */

// Error types
export {
  ConverterError,
  ConfigError,
  DocumentStructureError,
  PluginLoadError,
  LayoutError,
  FileAccessError,
} from './errors/ConverterError.js';
export type { ErrorContext, ConverterErrorJSON, Severity } from './errors/ConverterError.js';

// Logging
export { ConsoleLogger, FileLogger, MultiLogger, createLogger, isLogLevel, NULL_LOGGER } from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Config
export { loadConfig, validateConfig, DEFAULT_CONFIG, CONFIG_DIR, CONFIG_FILE } from './config/index.js';
export type { ConverterConfig } from './config/index.js';

// Defaults
export { DEFAULT_GRID_WIDTH, DEFAULT_TEMPLATE_MAP, DEFAULT_REMOVED_PACKAGES } from './constants.js';

// Text utilities
export {
  PUNCTUATION,
  stripPunctuation,
  stripBookMarkers,
  cleanText,
  charLength,
  extractBraceContent,
  extractOptionalArg,
  parseCommandName,
  stripLineComment,
  parseIndentOptions,
  collectCommandArgument,
} from './text/markup.js';
export type { Extracted, CollectedArgument, IndentOptions } from './text/markup.js';

// Pipeline stages
export { Parser, splitDocument, splitBody } from './parser/Parser.js';
export type { ParserOptions, LineResult } from './parser/Parser.js';
export { Layouter, buildSegmentStream, packSubColumns, pairSubColumns, charsPerColumn } from './layout/Layouter.js';
export type { LayouterOptions, StreamSegment } from './layout/Layouter.js';
export { Generator, formatSingle, formatDual, CONTENT_BEGIN, CONTENT_END, PAGE_BREAK } from './generator/Generator.js';
export type { GeneratorOptions } from './generator/Generator.js';
export { convertPreamble, DIGITAL_CLASS } from './generator/preamble.js';
export type { PreambleOptions } from './generator/preamble.js';

// Main orchestrator
export { Orchestrator, countBlocks } from './Orchestrator.js';
export type { OrchestratorOptions, ConversionResult } from './Orchestrator.js';

// Plugins
export { BaseConverterPlugin, isPluginClass } from './plugins/ConverterPlugin.js';
export type { ConverterPlugin, ParseContext, ParsedCommand, PluginMetadata } from './plugins/ConverterPlugin.js';
export { SikuMuluPlugin, stripStyleWrapper } from './plugins/SikuMuluPlugin.js';
export {
  expandElevation,
  hasElevationCommands,
  SINGLE_ELEVATION,
  LEVEL_ELEVATION,
  RELATIVE_ELEVATION,
  DYNASTY_MARKER,
  LINE_BREAK,
} from './plugins/elevation.js';

// Re-export types for convenience
export type {
  SemanticBlock,
  Segment,
  Column,
  DualColumn,
  SingleColumn,
  SubColumn,
  ParsedDocument,
  BlockType,
  JiazhuBlock,
  TemplateMapping,
} from '@guji-convert/types';
