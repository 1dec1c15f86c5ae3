/**
 * Generator - column records → layout-mode markup
 *
 * The first chapter heading is hoisted above the digitized-content
 * environment; every later chapter closes the environment, breaks the page,
 * and reopens it under the new heading.
 */

import type { Column, ConverterPlugin, DualColumn, Logger, SingleColumn } from '@guji-convert/types';
import { DEFAULT_REMOVED_PACKAGES, DEFAULT_TEMPLATE_MAP } from '../constants.js';
import { NULL_LOGGER } from '../logging/Logger.js';
import { convertPreamble } from './preamble.js';

export const CONTENT_BEGIN = '\\begin{数字化内容}';
export const CONTENT_END = '\\end{数字化内容}';
export const PAGE_BREAK = '\\换页';

export interface GeneratorOptions {
  plugin?: ConverterPlugin;
  /** Merged over the core table and the plugin's table */
  templateMap?: Record<string, string>;
  /** Added to the default list of dropped packages */
  removedPackages?: string[];
  logger?: Logger;
}

export function formatSingle(column: SingleColumn): string {
  return column.indent !== 0 ? `\\缩进[${column.indent}] ${column.text}` : column.text;
}

/**
 * Always carries \缩进[N], even for 0, so the entry after it starts from an
 * explicit vertical position.
 */
export function formatDual(column: DualColumn): string {
  const rightOpt = column.rightIndent !== undefined ? `[indent=${column.rightIndent}]` : '';
  const leftOpt = column.leftIndent !== undefined ? `[indent=${column.leftIndent}]` : '';
  return `\\缩进[${column.indent}]\\双列{\\右小列${rightOpt}{${column.right}}\\左小列${leftOpt}{${column.left}}}`;
}

class OutputBuffer {
  readonly lines: string[] = [];
  private environmentOpen = false;

  push(...lines: string[]): void {
    this.lines.push(...lines);
  }

  get last(): string | undefined {
    return this.lines[this.lines.length - 1];
  }

  openEnvironment(): void {
    this.lines.push(CONTENT_BEGIN);
    this.environmentOpen = true;
  }

  closeEnvironment(): void {
    if (!this.environmentOpen) return;
    // A page break right before the close would be stranded inside the environment
    if (this.last === PAGE_BREAK) {
      this.lines.pop();
    }
    this.lines.push(CONTENT_END);
    this.environmentOpen = false;
  }
}

export class Generator {
  private readonly templateMap: Record<string, string>;
  private readonly removedPackages: string[];
  private readonly logger: Logger;

  constructor(options: GeneratorOptions = {}) {
    this.templateMap = {
      ...DEFAULT_TEMPLATE_MAP,
      ...(options.plugin?.getTemplateMapping() ?? {}),
      ...(options.templateMap ?? {}),
    };
    this.removedPackages = [...new Set([...DEFAULT_REMOVED_PACKAGES, ...(options.removedPackages ?? [])])];
    this.logger = options.logger ?? NULL_LOGGER;
  }

  /**
   * The footer is accepted for symmetry with the parser; the output always ends
   * with a canonical \end{document}.
   */
  generate(preamble: string, preserved: string, columns: readonly Column[], _footer = ''): string {
    const out = new OutputBuffer();

    out.push(convertPreamble(preamble, { templateMap: this.templateMap, removedPackages: this.removedPackages }), '');

    if (preserved.trim()) {
      out.push(preserved.trimEnd(), '');
    }

    const firstChapter = columns.find(column => column.type === 'chapter');
    if (firstChapter?.type === 'chapter') {
      out.push(`\\chapter{${firstChapter.title}}`);
    }
    out.openEnvironment();

    let chapters = 0;
    for (const column of columns) {
      switch (column.type) {
        case 'chapter':
          chapters++;
          if (chapters === 1) break;
          out.closeEnvironment();
          out.push('\\newpage', `\\chapter{${column.title}}`);
          out.openEnvironment();
          break;
        case 'newpage':
          if (out.last !== PAGE_BREAK) out.push(PAGE_BREAK);
          break;
        case 'yinzhang':
          out.push(`${column.raw}%`);
          break;
        case 'single':
          out.push(formatSingle(column));
          break;
        case 'dual':
          out.push(formatDual(column));
          break;
        default: {
          const unreachable: never = column;
          throw new Error(`Unknown column: ${JSON.stringify(unreachable)}`);
        }
      }
    }

    out.push('');
    out.closeEnvironment();
    out.push('\\end{document}', '');

    this.logger.debug('Generated output', { lines: out.lines.length, chapters });
    return out.lines.join('\n');
  }
}
