/**
 * Plugin for the 四库全书简明目录 (Siku catalogue) template.
 *
 * Handles the template's annotation commands:
 * - \注{...}  annotation at indent 2
 * - \按{...}  editorial note at indent 4
 * Both may span lines and may contain elevation commands.
 */

import type { JiazhuBlock, ParseContext, ParsedCommand, PluginMetadata, Segment, TemplateMapping } from '@guji-convert/types';
import { collectCommandArgument, extractBraceContent, stripPunctuation } from '../text/markup.js';
import { BaseConverterPlugin } from './ConverterPlugin.js';
import { expandElevation } from './elevation.js';

const STYLE_OPEN = /\\样式\s*\[.*?\]\{/;

/**
 * Replaces every \样式[...]{content} with its content.
 */
export function stripStyleWrapper(text: string): string {
  let result = text;
  for (let m = STYLE_OPEN.exec(result); m; m = STYLE_OPEN.exec(result)) {
    const open = m.index + m[0].length - 1;
    const { content, end } = extractBraceContent(result, open);
    result = result.slice(0, m.index) + (content ?? '') + result.slice(end);
  }
  return result;
}

export class SikuMuluPlugin extends BaseConverterPlugin {
  static readonly ZHU_INDENT = 2;
  static readonly AN_INDENT = 4;

  get metadata(): PluginMetadata {
    return {
      name: 'siku-mulu',
      commands: ['注', '按'],
    };
  }

  getTemplateMapping(): TemplateMapping {
    return {
      '四库全书文渊阁简明目录': 'SikuWenyuanMulu',
    };
  }

  parseCommand(name: string, _line: string, context: ParseContext): ParsedCommand | null {
    switch (name) {
      case '注':
        return this.parseAnnotation('\\注', SikuMuluPlugin.ZHU_INDENT, context, true);
      case '按':
        // 謹按/謹案 stay: they still occupy slots once punctuation is gone
        return this.parseAnnotation('\\按', SikuMuluPlugin.AN_INDENT, context, false);
      default:
        return null;
    }
  }

  expandInJiazhu(text: string, baseIndent = 0): Segment[] {
    return expandElevation(text, baseIndent);
  }

  private parseAnnotation(command: string, indent: number, context: ParseContext, unwrapStyle: boolean): ParsedCommand {
    const collected = collectCommandArgument(context.lines, context.index, command);
    if (!collected.closed) {
      context.logger?.warn('Unclosed annotation argument, keeping text up to end of input', {
        command,
        line: context.index + 1,
      });
    }

    const content = unwrapStyle ? stripStyleWrapper(collected.content) : collected.content;
    const segments = this.expandInJiazhu(content, indent)
      .map(segment => ({ ...segment, text: stripPunctuation(segment.text) }))
      .filter(segment => segment.text);

    if (segments.length === 0) {
      return { blocks: [], consumedLines: collected.consumedLines };
    }

    const block: JiazhuBlock = {
      type: 'jiazhu',
      text: segments.map(segment => segment.text).join(''),
      indent,
    };
    if (segments.length > 1 || segments[0].indentDelta !== 0) {
      block.segments = segments;
    }
    return { blocks: [block], consumedLines: collected.consumedLines };
  }
}
