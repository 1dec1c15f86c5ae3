/**
 * Markup helpers shared by the parser and plugins: punctuation stripping,
 * brace/bracket argument extraction, multi-line command collection.
 */

/** Characters the layout dialect never renders */
export const PUNCTUATION = '，。、；：「」『』《》〈〉·？！（）〔〕';

const PUNCTUATION_SET = new Set(Array.from(PUNCTUATION));

export function stripPunctuation(text: string): string {
  return Array.from(text).filter(ch => !PUNCTUATION_SET.has(ch)).join('');
}

/** Removes the book-title brackets 《》 */
export function stripBookMarkers(text: string): string {
  return text.replace(/[《》]/g, '');
}

export function cleanText(text: string): string {
  return stripPunctuation(stripBookMarkers(text));
}

/** Length in characters, not UTF-16 code units */
export function charLength(text: string): number {
  return Array.from(text).length;
}

export interface Extracted {
  /** null when no group opens at the requested position */
  content: string | null;
  /** Index just past the closing delimiter */
  end: number;
  /** false when the text ended before the group closed */
  closed: boolean;
}

function extractGroup(text: string, start: number, open: string, close: string): Extracted {
  if (start >= text.length || text[start] !== open) {
    return { content: null, end: start, closed: false };
  }
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    if (text[i] === open) {
      depth++;
    } else if (text[i] === close) {
      depth--;
      if (depth === 0) {
        return { content: text.slice(start + 1, i), end: i + 1, closed: true };
      }
    }
  }
  // Unclosed: everything after the opener
  return { content: text.slice(start + 1), end: text.length, closed: false };
}

/**
 * Content of the `{...}` group opening exactly at `start`, nesting-aware.
 */
export function extractBraceContent(text: string, start = 0): Extracted {
  return extractGroup(text, start, '{', '}');
}

/**
 * Content of an optional `[...]` group at `start`, after optional whitespace.
 * When absent, `end` is `start` unchanged.
 */
export function extractOptionalArg(text: string, start = 0): Extracted {
  let pos = start;
  while (pos < text.length && /\s/.test(text[pos])) pos++;
  const result = extractGroup(text, pos, '[', ']');
  return result.content === null ? { content: null, end: start, closed: false } : result;
}

/**
 * Name of the leading backslash command: `\注{...}` → `注`.
 */
export function parseCommandName(line: string): string | null {
  const m = /^\\([^\s[{]+)/.exec(line.trim());
  return m ? m[1] : null;
}

/**
 * Removes a trailing `%` comment; `\%` is kept.
 */
export function stripLineComment(line: string): string {
  for (let i = 0; i < line.length; i++) {
    if (line[i] === '%' && (i === 0 || line[i - 1] !== '\\')) {
      return line.slice(0, i);
    }
  }
  return line;
}

export interface IndentOptions {
  indent?: number;
  firstIndent?: number;
}

/**
 * Reads `indent=N` and `first-indent=N` from an option string such as
 * `[indent=2, first-indent=0]`.
 */
export function parseIndentOptions(options: string | null | undefined): IndentOptions {
  const result: IndentOptions = {};
  if (!options) return result;
  const indent = /(?:^|[\s,[])indent\s*=\s*(-?\d+)/.exec(options);
  if (indent) result.indent = parseInt(indent[1], 10);
  const first = /first-indent\s*=\s*(-?\d+)/.exec(options);
  if (first) result.firstIndent = parseInt(first[1], 10);
  return result;
}

export interface CollectedArgument {
  /** Braced argument with newlines removed */
  content: string;
  /** Consumed lines joined with '\n' */
  source: string;
  consumedLines: number;
  /** false when input ended before the braces balanced */
  closed: boolean;
}

/**
 * Index of the first `{` belonging to `command`'s mandatory argument,
 * skipping one optional `[...]` group. -1 while more input is needed.
 */
function findArgumentBrace(text: string, command: string): number {
  const cmdPos = text.indexOf(command);
  if (cmdPos === -1) return -1;
  let pos = cmdPos + command.length;
  while (pos < text.length && /\s/.test(text[pos])) pos++;
  if (text[pos] === '[') {
    let depth = 0;
    let closedAt = -1;
    for (let i = pos; i < text.length; i++) {
      if (text[i] === '[') depth++;
      else if (text[i] === ']' && --depth === 0) {
        closedAt = i;
        break;
      }
    }
    if (closedAt === -1) return -1;
    pos = closedAt + 1;
  }
  return text.indexOf('{', pos);
}

/**
 * Collects a command whose braced argument may span several lines.
 *
 * Brace depth is tracked from the first `{` after the command name (and its
 * optional `[...]`). Lines are consumed until depth returns to zero. When the
 * input ends first, the content is everything after the opening brace with
 * trailing `}` trimmed.
 */
export function collectCommandArgument(
  lines: readonly string[],
  index: number,
  command: string
): CollectedArgument {
  let combined = '';
  let consumed = 0;

  for (let i = index; i < lines.length; i++) {
    combined += (consumed > 0 ? '\n' : '') + lines[i];
    consumed++;

    const braceStart = findArgumentBrace(combined, command);
    if (braceStart === -1) continue;

    const { content, closed } = extractBraceContent(combined, braceStart);
    if (closed && content !== null) {
      return { content: content.replace(/\n/g, ''), source: combined, consumedLines: consumed, closed: true };
    }
  }

  const braceStart = findArgumentBrace(combined, command);
  const salvaged = braceStart === -1 ? '' : combined.slice(braceStart + 1).replace(/\}+\s*$/, '');
  return {
    content: salvaged.replace(/\n/g, ''),
    source: combined,
    consumedLines: Math.max(consumed, 1),
    closed: false,
  };
}
