/**
 * Semantic block types - what the parser extracts from a semantic-mode document
 */

// === BLOCK TYPES ===
export const BLOCK_TYPE = {
  CHAPTER: 'chapter',
  NEWPAGE: 'newpage',
  YINZHANG: 'yinzhang',
  TEXT: 'text',
  TIAOMU: 'tiaomu',
  PARAGRAPH: 'paragraph',
  JIAZHU: 'jiazhu',
} as const;

export type BlockType = typeof BLOCK_TYPE[keyof typeof BLOCK_TYPE];

// === SEGMENT ===
/**
 * A run of annotation text sharing one indent.
 * Produced when annotation text contains inline elevation commands.
 */
export interface Segment {
  text: string;
  /** Relative to the owning block's base indent */
  indentDelta: number;
  /** Segment must start a new sub-column even if the current one has room */
  forceBreak: boolean;
}

// === BLOCK VARIANTS ===
export interface ChapterBlock {
  type: 'chapter';
  title: string;
}

export interface NewpageBlock {
  type: 'newpage';
}

/** Seal stamp; `raw` is the canonical single-line command */
export interface YinzhangBlock {
  type: 'yinzhang';
  raw: string;
}

export interface TextBlock {
  type: 'text';
  text: string;
  indent: number;
}

/** Leveled catalogue entry; the level doubles as indent */
export interface TiaomuBlock {
  type: 'tiaomu';
  level: number;
  text: string;
}

export interface ParagraphBlock {
  type: 'paragraph';
  text: string;
  indent: number;
  firstIndent: number;
}

/** Interlinear annotation, laid out in paired half-width sub-columns */
export interface JiazhuBlock {
  type: 'jiazhu';
  text: string;
  indent: number;
  segments?: Segment[];
}

export type SemanticBlock =
  | ChapterBlock
  | NewpageBlock
  | YinzhangBlock
  | TextBlock
  | TiaomuBlock
  | ParagraphBlock
  | JiazhuBlock;

// === DOCUMENT ===
export interface ParsedDocument {
  /** Everything up to and including \begin{document} */
  preamble: string;
  /** Cover and title pages before the body environment, copied verbatim */
  preserved: string;
  blocks: SemanticBlock[];
  /** \end{document} and anything after it */
  footer: string;
}

export function isJiazhuBlock(block: SemanticBlock): block is JiazhuBlock {
  return block.type === BLOCK_TYPE.JIAZHU;
}
