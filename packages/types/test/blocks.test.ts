/**
 * Block and column type tests
 *
 * - Tag constants match the union members
 * - isJiazhuBlock narrows annotation blocks
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { BLOCK_TYPE, COLUMN_TYPE, isJiazhuBlock, type SemanticBlock } from '@guji-convert/types';

describe('BLOCK_TYPE', () => {
  it('should list every block tag', () => {
    assert.deepStrictEqual(Object.values(BLOCK_TYPE).sort(), [
      'chapter',
      'jiazhu',
      'newpage',
      'paragraph',
      'text',
      'tiaomu',
      'yinzhang',
    ]);
  });
});

describe('COLUMN_TYPE', () => {
  it('should list every column tag', () => {
    assert.deepStrictEqual(Object.values(COLUMN_TYPE).sort(), ['chapter', 'dual', 'newpage', 'single', 'yinzhang']);
  });
});

describe('isJiazhuBlock', () => {
  it('should select annotation blocks only', () => {
    const blocks: SemanticBlock[] = [
      { type: 'text', text: '甲', indent: 0 },
      { type: 'jiazhu', text: '乙', indent: 2 },
      { type: 'tiaomu', level: 1, text: '丙' },
    ];
    const annotations = blocks.filter(isJiazhuBlock);
    assert.deepStrictEqual(annotations.map(block => block.indent), [2]);
  });
});
