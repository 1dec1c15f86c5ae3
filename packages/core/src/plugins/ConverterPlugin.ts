/**
 * Base converter plugin
 *
 * PLUGIN CONTRACT:
 *
 * 1. Metadata - plugin name (and optionally the commands it handles)
 * 2. Hooks - each capability has a no-op default; override what the template needs
 * 3. Loading - a plugin module exports exactly one concrete subclass
 */

import type {
  ConverterPlugin,
  ParseContext,
  ParsedCommand,
  PluginMetadata,
  SemanticBlock,
  Segment,
  TemplateMapping,
} from '@guji-convert/types';

export type { ConverterPlugin, ParseContext, ParsedCommand, PluginMetadata };

/**
 * Base class - extend this for template-specific plugins
 */
export abstract class BaseConverterPlugin implements ConverterPlugin {
  abstract get metadata(): PluginMetadata;

  getTemplateMapping(): TemplateMapping {
    return {};
  }

  preprocessLine(_line: string): string | null {
    return null;
  }

  parseCommand(_name: string, _line: string, _context: ParseContext): ParsedCommand | null {
    return null;
  }

  expandInJiazhu(text: string, _baseIndent = 0): Segment[] {
    return [{ text, indentDelta: 0, forceBreak: false }];
  }

  postprocessBlocks(blocks: SemanticBlock[]): SemanticBlock[] {
    return blocks;
  }
}

/**
 * True for classes extending BaseConverterPlugin (the base itself excluded).
 * Used when searching a loaded module for its plugin.
 */
export function isPluginClass(value: unknown): value is new () => BaseConverterPlugin {
  return typeof value === 'function'
    && value !== BaseConverterPlugin
    && value.prototype instanceof BaseConverterPlugin;
}
