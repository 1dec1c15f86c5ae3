/**
 * Elevation command expansion tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { expandElevation, hasElevationCommands } from '@guji-convert/core';

describe('expandElevation', () => {
  it('should return one segment when there are no commands', () => {
    assert.deepStrictEqual(expandElevation('甲乙', 2), [{ text: '甲乙', indentDelta: 0, forceBreak: false }]);
  });

  it('should move text after \\单抬 to indent -1', () => {
    assert.deepStrictEqual(expandElevation('甲\\单抬乙', 2), [
      { text: '甲', indentDelta: 0, forceBreak: false },
      { text: '乙', indentDelta: -3, forceBreak: true },
    ]);
  });

  it('should move text after \\平抬 to indent 0', () => {
    assert.deepStrictEqual(expandElevation('甲\\平抬乙', 2), [
      { text: '甲', indentDelta: 0, forceBreak: false },
      { text: '乙', indentDelta: -2, forceBreak: true },
    ]);
  });

  it('should elevate relative to the base indent and keep that indent afterwards', () => {
    assert.deepStrictEqual(expandElevation('甲\\相对抬头[1]{乙丙}丁', 2), [
      { text: '甲', indentDelta: 0, forceBreak: false },
      { text: '乙丙', indentDelta: -1, forceBreak: true },
      { text: '丁', indentDelta: -1, forceBreak: false },
    ]);
  });

  it('should break before the dynasty marker without changing indent', () => {
    assert.deepStrictEqual(expandElevation('甲\\國朝乙', 2), [
      { text: '甲', indentDelta: 0, forceBreak: false },
      { text: '國朝', indentDelta: 0, forceBreak: true },
      { text: '乙', indentDelta: 0, forceBreak: false },
    ]);
  });

  it('should break on \\\\ at the current indent', () => {
    assert.deepStrictEqual(expandElevation('甲\\\\乙', 2), [
      { text: '甲', indentDelta: 0, forceBreak: false },
      { text: '乙', indentDelta: 0, forceBreak: true },
    ]);
  });

  it('should resolve consecutive commands to the last one', () => {
    assert.deepStrictEqual(expandElevation('甲\\单抬\\平抬乙', 2), [
      { text: '甲', indentDelta: 0, forceBreak: false },
      { text: '乙', indentDelta: -2, forceBreak: true },
    ]);
  });

  it('should let a relative elevation override a preceding shorthand', () => {
    assert.deepStrictEqual(expandElevation('\\单抬\\相对抬头[1]{乙}', 2), [
      { text: '乙', indentDelta: -1, forceBreak: true },
    ]);
  });

  it('should ignore a trailing command', () => {
    assert.deepStrictEqual(expandElevation('甲\\单抬', 2), [{ text: '甲', indentDelta: 0, forceBreak: false }]);
  });
});

describe('hasElevationCommands', () => {
  it('should detect any command', () => {
    assert.strictEqual(hasElevationCommands('甲\\國朝'), true);
    assert.strictEqual(hasElevationCommands('甲乙'), false);
  });
});
