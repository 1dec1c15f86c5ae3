/**
 * Layouter - semantic blocks → column records on a fixed grid
 *
 * Non-annotation blocks map to single columns. Runs of consecutive jiazhu
 * blocks are merged into one segment stream, packed into half-width
 * sub-columns, and paired into dual columns (right first, then left).
 */

import type {
  Column,
  DualColumn,
  JiazhuBlock,
  Logger,
  ParagraphBlock,
  SemanticBlock,
  SingleColumn,
  SubColumn,
} from '@guji-convert/types';
import { COLUMN_TYPE, isJiazhuBlock } from '@guji-convert/types';
import { DEFAULT_GRID_WIDTH } from '../constants.js';
import { LayoutError } from '../errors/ConverterError.js';
import { NULL_LOGGER } from '../logging/Logger.js';

export interface LayouterOptions {
  gridWidth?: number;
  logger?: Logger;
}

/** One entry of the merged annotation stream, with absolute indent */
export interface StreamSegment {
  text: string;
  indent: number;
  forceBreak: boolean;
}

/**
 * Slots left in a column at the given indent. Throws when none are left.
 */
export function charsPerColumn(gridWidth: number, indent: number): number {
  const chars = gridWidth - indent;
  if (chars <= 0) {
    throw new LayoutError(
      `Indent ${indent} leaves no room in a ${gridWidth}-character column`,
      'ERR_GRID_TOO_NARROW',
      { gridWidth, indent },
      'Increase the grid width or reduce the indent in the source'
    );
  }
  return chars;
}

/**
 * Flattens a run of annotation blocks into one stream.
 * Blocks with segments contribute each non-empty segment at base + delta.
 */
export function buildSegmentStream(blocks: readonly JiazhuBlock[]): StreamSegment[] {
  const stream: StreamSegment[] = [];
  for (const block of blocks) {
    if (block.segments && block.segments.length > 0) {
      for (const segment of block.segments) {
        if (!segment.text) continue;
        stream.push({
          text: segment.text,
          indent: block.indent + segment.indentDelta,
          forceBreak: segment.forceBreak,
        });
      }
    } else if (block.text) {
      stream.push({ text: block.text, indent: block.indent, forceBreak: false });
    }
  }
  return stream;
}

/**
 * Packs the stream into sub-columns.
 *
 * A sub-column takes the indent of the first segment it consumes and fills up
 * to `gridWidth - indent` characters. It ends early when a segment runs out
 * and the next one has another indent or forces a break.
 */
export function packSubColumns(stream: readonly StreamSegment[], gridWidth: number): SubColumn[] {
  const chars = stream.map(segment => Array.from(segment.text));
  const subColumns: SubColumn[] = [];
  let segIdx = 0;
  let segPos = 0;

  while (segIdx < stream.length) {
    if (segPos >= chars[segIdx].length) {
      segIdx++;
      segPos = 0;
      continue;
    }

    const indent = stream[segIdx].indent;
    let remaining = charsPerColumn(gridWidth, indent);
    let text = '';

    while (remaining > 0 && segIdx < stream.length) {
      const segChars = chars[segIdx];
      const take = Math.min(remaining, segChars.length - segPos);
      text += segChars.slice(segPos, segPos + take).join('');
      segPos += take;
      remaining -= take;

      if (segPos >= segChars.length) {
        segIdx++;
        segPos = 0;
        if (remaining > 0 && segIdx < stream.length) {
          const next = stream[segIdx];
          if (next.indent !== indent || next.forceBreak) break;
        }
      }
    }

    subColumns.push({ text, indent });
  }

  return subColumns;
}

/**
 * Pairs sub-columns into dual columns. An odd trailing sub-column gets an
 * empty left side at its own indent.
 */
export function pairSubColumns(subColumns: readonly SubColumn[]): DualColumn[] {
  const columns: DualColumn[] = [];
  for (let k = 0; k < subColumns.length; k += 2) {
    const right = subColumns[k];
    const left: SubColumn = k + 1 < subColumns.length ? subColumns[k + 1] : { text: '', indent: right.indent };

    const column: DualColumn = {
      type: COLUMN_TYPE.DUAL,
      indent: right.indent,
      right: right.text,
      left: left.text,
    };
    if (left.indent !== right.indent) {
      column.leftIndent = left.indent;
    }
    columns.push(column);
  }
  return columns;
}

export class Layouter {
  private readonly gridWidth: number;
  private readonly logger: Logger;

  constructor(options: LayouterOptions = {}) {
    this.gridWidth = options.gridWidth ?? DEFAULT_GRID_WIDTH;
    this.logger = options.logger ?? NULL_LOGGER;
  }

  layout(blocks: readonly SemanticBlock[]): Column[] {
    const columns: Column[] = [];

    let i = 0;
    while (i < blocks.length) {
      const block = blocks[i];

      if (isJiazhuBlock(block)) {
        const run: JiazhuBlock[] = [];
        while (i < blocks.length) {
          const next = blocks[i];
          if (!isJiazhuBlock(next)) break;
          run.push(next);
          i++;
        }
        columns.push(...this.layoutJiazhuRun(run));
        continue;
      }

      switch (block.type) {
        case 'chapter':
          columns.push({ type: COLUMN_TYPE.CHAPTER, title: block.title });
          break;
        case 'newpage':
          columns.push({ type: COLUMN_TYPE.NEWPAGE });
          break;
        case 'yinzhang':
          columns.push({ type: COLUMN_TYPE.YINZHANG, raw: block.raw });
          break;
        case 'text':
          columns.push(...this.single(block.text, block.indent));
          break;
        case 'tiaomu':
          columns.push(...this.single(block.text, block.level));
          break;
        case 'paragraph':
          columns.push(...this.layoutParagraph(block));
          break;
        default: {
          const unreachable: never = block;
          throw new Error(`Unknown block: ${JSON.stringify(unreachable)}`);
        }
      }
      i++;
    }

    this.logger.debug('Layout complete', { blocks: blocks.length, columns: columns.length, gridWidth: this.gridWidth });
    return columns;
  }

  private single(text: string, indent: number): SingleColumn[] {
    if (!text) return [];
    charsPerColumn(this.gridWidth, indent);
    return [{ type: COLUMN_TYPE.SINGLE, text, indent }];
  }

  /**
   * Greedy slices: the first at firstIndent, the rest at indent.
   */
  private layoutParagraph(block: ParagraphBlock): SingleColumn[] {
    const chars = Array.from(block.text);
    const columns: SingleColumn[] = [];

    let pos = 0;
    while (pos < chars.length) {
      const indent = pos === 0 ? block.firstIndent : block.indent;
      const width = charsPerColumn(this.gridWidth, indent);
      columns.push({ type: COLUMN_TYPE.SINGLE, text: chars.slice(pos, pos + width).join(''), indent });
      pos += width;
    }
    return columns;
  }

  private layoutJiazhuRun(run: readonly JiazhuBlock[]): DualColumn[] {
    const stream = buildSegmentStream(run);
    if (stream.length === 0) return [];

    const subColumns = packSubColumns(stream, this.gridWidth);
    this.logger.trace('Packed annotation run', { blocks: run.length, segments: stream.length, subColumns: subColumns.length });
    return pairSubColumns(subColumns);
  }
}
