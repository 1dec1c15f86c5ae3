/**
 * Column types - what the layouter produces and the generator serializes
 */

export const COLUMN_TYPE = {
  CHAPTER: 'chapter',
  NEWPAGE: 'newpage',
  YINZHANG: 'yinzhang',
  SINGLE: 'single',
  DUAL: 'dual',
} as const;

export type ColumnType = typeof COLUMN_TYPE[keyof typeof COLUMN_TYPE];

export interface ChapterColumn {
  type: typeof COLUMN_TYPE.CHAPTER;
  title: string;
}

export interface NewpageColumn {
  type: typeof COLUMN_TYPE.NEWPAGE;
}

export interface YinzhangColumn {
  type: typeof COLUMN_TYPE.YINZHANG;
  raw: string;
}

export interface SingleColumn {
  type: typeof COLUMN_TYPE.SINGLE;
  text: string;
  indent: number;
}

/**
 * Two half-width sub-columns sharing one grid column.
 * `right` is read first. Overrides are present only when a side's indent
 * differs from `indent`.
 */
export interface DualColumn {
  type: typeof COLUMN_TYPE.DUAL;
  indent: number;
  right: string;
  left: string;
  rightIndent?: number;
  leftIndent?: number;
}

export type Column =
  | ChapterColumn
  | NewpageColumn
  | YinzhangColumn
  | SingleColumn
  | DualColumn;

/** One packed sub-column before pairing */
export interface SubColumn {
  text: string;
  indent: number;
}
