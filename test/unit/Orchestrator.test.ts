/**
 * Orchestrator Tests
 *
 * End-to-end parse → layout → generate with the Siku catalogue plugin.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  Orchestrator,
  SikuMuluPlugin,
  DocumentStructureError,
  countBlocks,
  CONTENT_BEGIN,
  CONTENT_END,
  type Logger,
} from '@guji-convert/core';

function createRecordingLogger(): Logger & { infos: string[] } {
  const infos: string[] = [];
  return {
    infos,
    error: () => {},
    warn: () => {},
    info: (message: string) => {
      infos.push(message);
    },
    debug: () => {},
    trace: () => {},
  };
}

const SOURCE = [
  '\\documentclass[四库全书文渊阁简明目录]{guji}',
  '\\usepackage{enumitem}',
  '\\begin{document}',
  '\\begin{正文}',
  '\\chapter{經部}',
  '\\条目[1]{易類}',
  '\\注{甲乙丙，丁戊己。}',
  '\\newpage',
  '\\end{正文}',
  '\\end{document}',
  '',
].join('\n');

describe('Orchestrator', () => {
  it('should convert a document through all three stages', () => {
    const logger = createRecordingLogger();
    const orchestrator = new Orchestrator({ plugin: new SikuMuluPlugin(), gridWidth: 5, logger });

    const result = orchestrator.convert(SOURCE);

    assert.strictEqual(
      result.output,
      [
        '\\documentclass[SikuWenyuanMulu]{guji-digital}',
        '\\begin{document}',
        '',
        '\\chapter{經部}',
        CONTENT_BEGIN,
        '\\缩进[1] 易類',
        '\\缩进[2]\\双列{\\右小列{甲乙丙}\\左小列{丁戊己}}',
        '\\换页',
        '',
        CONTENT_END,
        '\\end{document}',
        '',
      ].join('\n')
    );
    assert.deepStrictEqual(result.columns, [
      { type: 'chapter', title: '經部' },
      { type: 'single', text: '易類', indent: 1 },
      { type: 'dual', indent: 2, right: '甲乙丙', left: '丁戊己' },
      { type: 'newpage' },
    ]);
    assert.deepStrictEqual(Object.entries(result.blockCounts), [
      ['chapter', 1],
      ['jiazhu', 1],
      ['newpage', 1],
      ['tiaomu', 1],
    ]);
  });

  it('should report each stage', () => {
    const logger = createRecordingLogger();
    new Orchestrator({ plugin: new SikuMuluPlugin(), gridWidth: 5, logger }).convert(SOURCE);

    assert.strictEqual(logger.infos[0], 'Using plugin');
    assert.ok(logger.infos.includes('Stage 1 complete: 4 semantic blocks'));
    assert.ok(logger.infos.includes('  tiaomu: 1'));
    assert.ok(logger.infos.includes('Stage 2 complete: 4 columns'));
  });

  it('should give the same output on repeated runs', () => {
    const orchestrator = new Orchestrator({ plugin: new SikuMuluPlugin(), logLevel: 'silent' });
    assert.strictEqual(orchestrator.convert(SOURCE).output, orchestrator.convert(SOURCE).output);
  });

  it('should leave plugin commands as text without a plugin', () => {
    const result = new Orchestrator({ logLevel: 'silent' }).convert(SOURCE);
    assert.deepStrictEqual(result.blocks[2], { type: 'text', text: '\\注{甲乙丙丁戊己}', indent: 0 });
  });

  it('should propagate structure errors', () => {
    assert.throws(
      () => new Orchestrator({ logLevel: 'silent' }).convert('no markers'),
      DocumentStructureError
    );
  });
});

describe('countBlocks', () => {
  it('should count by type in type order', () => {
    const counts = countBlocks([
      { type: 'text', text: '甲', indent: 0 },
      { type: 'chapter', title: '經部' },
      { type: 'text', text: '乙', indent: 0 },
    ]);
    assert.deepStrictEqual(Object.entries(counts), [
      ['chapter', 1],
      ['text', 2],
    ]);
  });
});
