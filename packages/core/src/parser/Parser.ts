/**
 * Parser - semantic-mode markup → semantic blocks
 *
 * Splits the document at \begin{document} / \end{document}, separates the
 * cover and title pages (kept verbatim) from the body environment, then scans
 * body lines with a cursor. Every recognizer returns the blocks it produced
 * together with how many lines it consumed.
 */

import type {
  ConverterPlugin,
  Logger,
  ParsedDocument,
  ParseContext,
  SemanticBlock,
} from '@guji-convert/types';
import { DocumentStructureError } from '../errors/ConverterError.js';
import { NULL_LOGGER } from '../logging/Logger.js';
import {
  cleanText,
  collectCommandArgument,
  extractBraceContent,
  extractOptionalArg,
  parseCommandName,
  parseIndentOptions,
  stripLineComment,
  stripPunctuation,
} from '../text/markup.js';
import { DEFAULT_GRID_WIDTH } from '../constants.js';

export interface ParserOptions {
  plugin?: ConverterPlugin;
  gridWidth?: number;
  logger?: Logger;
}

/** What one recognizer produced and how far the cursor moves */
export interface LineResult {
  blocks: SemanticBlock[];
  advance: number;
}

const BODY_BEGIN = /\\begin\{(正文|BodyText)\}/;
const BODY_BEGIN_STRIP = /\\begin\{(?:正文|BodyText)\}\s*/;
const BODY_END_STRIP = /\\end\{(?:正文|BodyText)\}\s*/;

const CHAPTER = /^\\chapter\{(.+)\}/;
const SEAL_START = /^\\印章\s*\[/;
const SEAL_CANONICAL = /^\\印章\[(.+?)\]\{(.+?)\}/;
const PARAGRAPH_BEGIN = /^\\begin\{段落\}(\[.*?\])?/;
const PARAGRAPH_END = '\\end{段落}';
const TIAOMU = /^\\条目\[(\d+)\]\{(.+)\}/;
const EMBEDDED_JIAZHU = '\\夹注';
const STYLE = /^\\样式\s*\[.*?\]\{/;

export class Parser {
  private readonly plugin?: ConverterPlugin;
  private readonly gridWidth: number;
  private readonly logger: Logger;

  constructor(options: ParserOptions = {}) {
    this.plugin = options.plugin;
    this.gridWidth = options.gridWidth ?? DEFAULT_GRID_WIDTH;
    this.logger = options.logger ?? NULL_LOGGER;
  }

  parse(content: string): ParsedDocument {
    const { preamble, body, footer } = splitDocument(content);
    const { preserved, main } = splitBody(body);

    let blocks = this.parseBody(main);
    if (this.plugin) {
      blocks = this.plugin.postprocessBlocks(blocks);
    }

    return { preamble, preserved, blocks, footer };
  }

  private parseBody(main: string): SemanticBlock[] {
    const content = main.replace(BODY_BEGIN_STRIP, '').replace(BODY_END_STRIP, '');
    const lines = content.split('\n');
    const blocks: SemanticBlock[] = [];

    let i = 0;
    while (i < lines.length) {
      let line = lines[i].trimEnd();

      // Blank lines separate paragraphs; they are not content
      if (!line.trim() || line.trim().startsWith('%')) {
        i++;
        continue;
      }

      if (this.plugin) {
        const preprocessed = this.plugin.preprocessLine(line);
        if (preprocessed !== null) {
          line = preprocessed;
          lines[i] = preprocessed;
        }
      }

      const result = this.parseLine(line, lines, i);
      blocks.push(...result.blocks);
      i += Math.max(result.advance, 1);
    }

    this.logger.debug('Parsed body', { lines: lines.length, blocks: blocks.length });
    return blocks;
  }

  private parseLine(line: string, lines: string[], index: number): LineResult {
    const stripped = line.trim();

    const chapter = CHAPTER.exec(stripped);
    if (chapter) {
      return { blocks: [{ type: 'chapter', title: chapter[1] }], advance: 1 };
    }

    if (stripped === '\\newpage') {
      return { blocks: [{ type: 'newpage' }], advance: 1 };
    }

    if (SEAL_START.test(stripped)) {
      return parseSeal(lines, index);
    }

    const paragraph = PARAGRAPH_BEGIN.exec(stripped);
    if (paragraph) {
      return parseParagraph(lines, index, paragraph[1], stripped.slice(paragraph[0].length));
    }

    const tiaomu = TIAOMU.exec(stripped);
    if (tiaomu) {
      return {
        blocks: [{ type: 'tiaomu', level: parseInt(tiaomu[1], 10), text: parseTiaomuText(tiaomu[2]) }],
        advance: 1,
      };
    }

    if (this.plugin && stripped.startsWith('\\')) {
      const name = parseCommandName(stripped);
      if (name) {
        const context: ParseContext = { lines, index, gridWidth: this.gridWidth, logger: this.logger };
        const parsed = this.plugin.parseCommand(name, stripped, context);
        if (parsed !== null) {
          return { blocks: parsed.blocks, advance: Math.max(parsed.consumedLines, 1) };
        }
      }
    }

    if (STYLE.test(stripped)) {
      const open = stripped.indexOf('{', stripped.indexOf(']'));
      const { content } = extractBraceContent(stripped, open);
      return textResult(content ?? '');
    }

    if (stripped.startsWith('\\')) {
      this.logger.debug('Unrecognized command kept as text', { line: index + 1, command: parseCommandName(stripped) });
    }
    return textResult(stripped);
  }
}

function textResult(raw: string): LineResult {
  const text = cleanText(raw);
  return { blocks: text ? [{ type: 'text', text, indent: 0 }] : [], advance: 1 };
}

export function splitDocument(content: string): { preamble: string; body: string; footer: string } {
  const begin = /\\begin\{document\}/.exec(content);
  const end = /\\end\{document\}/.exec(content);
  if (!begin || !end) {
    throw new DocumentStructureError(
      'Cannot find \\begin{document} or \\end{document}',
      'ERR_DOCUMENT_BOUNDARY_MISSING',
      { missing: !begin ? '\\begin{document}' : '\\end{document}' },
      'Check that the input is a complete guji document'
    );
  }
  const beginEnd = begin.index + begin[0].length;
  return {
    preamble: content.slice(0, beginEnd),
    body: content.slice(beginEnd, end.index),
    footer: content.slice(end.index),
  };
}

export function splitBody(body: string): { preserved: string; main: string } {
  const m = BODY_BEGIN.exec(body);
  if (!m) {
    return { preserved: '', main: body };
  }
  return { preserved: body.slice(0, m.index), main: body.slice(m.index) };
}

/**
 * \印章[...]{...} may span lines; it is flattened and re-emitted on one line.
 */
function parseSeal(lines: string[], index: number): LineResult {
  const collected = collectCommandArgument(lines, index, '\\印章');
  const flattened = collected.source.replace(/\s+/g, '');
  const m = SEAL_CANONICAL.exec(flattened);
  const raw = m ? `\\印章[${m[1]}]{${m[2]}}` : flattened;
  return { blocks: [{ type: 'yinzhang', raw }], advance: collected.consumedLines };
}

/**
 * \begin{段落}[indent=N, first-indent=M] ... \end{段落}
 *
 * Text may share a line with either marker. The paragraph ends at the first
 * \end{段落}, including one on the opening line.
 */
function parseParagraph(lines: string[], index: number, options: string | undefined, opening: string): LineResult {
  const { indent = 0, firstIndent } = parseIndentOptions(options);

  let consumed = 0;
  let text = '';
  for (let i = index; i < lines.length; i++) {
    consumed++;
    const line = i === index ? opening : lines[i];
    const end = line.indexOf(PARAGRAPH_END);
    const content = (end === -1 ? line : line.slice(0, end)).trim();
    if (!content.startsWith('%')) {
      text += stripLineComment(content).trim();
    }
    if (end !== -1) break;
  }

  text = stripPunctuation(text);
  if (!text) {
    return { blocks: [], advance: consumed };
  }
  return {
    blocks: [{ type: 'paragraph', text, indent, firstIndent: firstIndent ?? indent }],
    advance: consumed,
  };
}

/**
 * Entry text with any embedded \夹注[...]{note} pulled out and appended.
 */
function parseTiaomuText(raw: string): string {
  const text = cleanText(raw);
  const at = text.indexOf(EMBEDDED_JIAZHU);
  if (at === -1) return text;

  const options = extractOptionalArg(text, at + EMBEDDED_JIAZHU.length);
  const note = extractBraceContent(text, options.end);
  if (note.content === null) return text;

  const before = text.slice(0, at).trim();
  const after = text.slice(note.end).trim();
  return before + stripPunctuation(note.content) + after;
}
