/**
 * Markup helper tests
 *
 * - Punctuation and book-title bracket removal
 * - Brace / bracket extraction with nesting
 * - Multi-line argument collection and unclosed salvage
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
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
} from '@guji-convert/core';

describe('text/markup', () => {
  describe('punctuation', () => {
    it('should remove every punctuation character', () => {
      assert.strictEqual(stripPunctuation('經部，易類。「周易」'), '經部易類周易');
    });

    it('should remove book-title brackets', () => {
      assert.strictEqual(stripBookMarkers('《周易》正義'), '周易正義');
    });

    it('should clean both in one pass', () => {
      assert.strictEqual(cleanText('《周易正義》，十卷。'), '周易正義十卷');
    });

    it('should count characters, not code units', () => {
      assert.strictEqual(charLength('𠀀甲'), 2);
    });
  });

  describe('extractBraceContent', () => {
    it('should honor nested braces', () => {
      const result = extractBraceContent('{甲{乙}丙}丁', 0);
      assert.deepStrictEqual(result, { content: '甲{乙}丙', end: 7, closed: true });
    });

    it('should return null content when no brace opens at start', () => {
      assert.deepStrictEqual(extractBraceContent('甲{乙}', 0), { content: null, end: 0, closed: false });
    });

    it('should salvage an unclosed group', () => {
      assert.deepStrictEqual(extractBraceContent('{甲{乙}', 0), { content: '甲{乙}', end: 5, closed: false });
    });
  });

  describe('extractOptionalArg', () => {
    it('should read a bracket group after whitespace', () => {
      assert.deepStrictEqual(extractOptionalArg('x [a=1]{b}', 1), { content: 'a=1', end: 7, closed: true });
    });

    it('should leave end unchanged when absent', () => {
      assert.deepStrictEqual(extractOptionalArg('x {b}', 1), { content: null, end: 1, closed: false });
    });
  });

  describe('parseCommandName', () => {
    it('should stop at brackets and braces', () => {
      assert.strictEqual(parseCommandName('  \\注{文}'), '注');
      assert.strictEqual(parseCommandName('\\相对抬头[1]{文}'), '相对抬头');
    });

    it('should return null for plain text', () => {
      assert.strictEqual(parseCommandName('正文'), null);
    });
  });

  describe('stripLineComment', () => {
    it('should drop a trailing comment', () => {
      assert.strictEqual(stripLineComment('正文 % note'), '正文 ');
    });

    it('should keep an escaped percent sign', () => {
      assert.strictEqual(stripLineComment('百分\\%之'), '百分\\%之');
    });
  });

  describe('parseIndentOptions', () => {
    it('should read both options', () => {
      assert.deepStrictEqual(parseIndentOptions('[indent=2, first-indent=0]'), { indent: 2, firstIndent: 0 });
    });

    it('should not mistake first-indent for indent', () => {
      assert.deepStrictEqual(parseIndentOptions('[first-indent=3]'), { firstIndent: 3 });
    });

    it('should return nothing for missing options', () => {
      assert.deepStrictEqual(parseIndentOptions(undefined), {});
    });
  });

  describe('collectCommandArgument', () => {
    it('should collect a single-line argument', () => {
      const result = collectCommandArgument(['\\注{甲乙}'], 0, '\\注');
      assert.deepStrictEqual(result, { content: '甲乙', source: '\\注{甲乙}', consumedLines: 1, closed: true });
    });

    it('should join lines until braces balance', () => {
      const lines = ['\\注{甲', '乙{丙}', '丁}', '後文'];
      const result = collectCommandArgument(lines, 0, '\\注');
      assert.strictEqual(result.content, '甲乙{丙}丁');
      assert.strictEqual(result.consumedLines, 3);
      assert.strictEqual(result.closed, true);
    });

    it('should skip an optional argument spanning lines', () => {
      const lines = ['\\印章[', 'scale=0.5]{seal.png}'];
      const result = collectCommandArgument(lines, 0, '\\印章');
      assert.strictEqual(result.content, 'seal.png');
      assert.strictEqual(result.consumedLines, 2);
    });

    it('should salvage everything after the brace when input ends', () => {
      const unclosed = ['\\按{甲{', '乙}'];
      const result = collectCommandArgument(unclosed, 0, '\\按');
      assert.strictEqual(result.closed, false);
      assert.strictEqual(result.content, '甲{乙');
      assert.strictEqual(result.consumedLines, 2);
    });
  });
});
