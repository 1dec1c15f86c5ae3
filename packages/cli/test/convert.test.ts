/**
 * Convert command tests
 *
 * Runs conversions against temporary files; no build or child process needed.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConsoleLogger, FileAccessError } from '@guji-convert/core';
import { runConvert, formatSummary } from '../src/commands/convertAction.js';
import { convertCommand } from '../src/commands/convert.js';

const SOURCE = [
  '\\documentclass[四库全书文渊阁简明目录]{guji}',
  '\\begin{document}',
  '\\begin{正文}',
  '\\chapter{經部}',
  '\\条目[1]{易類}',
  '\\注{甲乙丙，丁戊己。}',
  '\\end{正文}',
  '\\end{document}',
  '',
].join('\n');

const EXPECTED = [
  '\\documentclass[SikuWenyuanMulu]{guji-digital}',
  '\\begin{document}',
  '',
  '\\chapter{經部}',
  '\\begin{数字化内容}',
  '\\缩进[1] 易類',
  '\\缩进[2]\\双列{\\右小列{甲乙丙}\\左小列{丁戊己}}',
  '',
  '\\end{数字化内容}',
  '\\end{document}',
  '',
].join('\n');

const silent = new ConsoleLogger('silent');

describe('convert', () => {
  let projectDir: string;
  let inputPath: string;

  beforeEach(() => {
    projectDir = mkdtempSync(join(tmpdir(), 'guji-convert-'));
    mkdirSync(join(projectDir, '.guji-convert'));
    writeFileSync(join(projectDir, '.guji-convert', 'config.yaml'), 'plugin: siku-mulu\ngridWidth: 5\n');
    inputPath = join(projectDir, 'book.tex');
    writeFileSync(inputPath, SOURCE);
  });

  afterEach(() => {
    rmSync(projectDir, { recursive: true, force: true });
  });

  describe('runConvert', () => {
    it('takes plugin and grid width from the project config', async () => {
      const outputPath = join(projectDir, 'out', 'book-digital.tex');
      const summary = await runConvert(inputPath, { output: outputPath, project: projectDir }, silent);

      assert.equal(readFileSync(outputPath, 'utf-8'), EXPECTED);
      assert.equal(summary.plugin, 'siku-mulu');
      assert.equal(summary.gridWidth, 5);
      assert.equal(summary.blocks, 3);
      assert.equal(summary.columns, 3);
      assert.equal(summary.characters, Array.from(EXPECTED).length);
    });

    it('lets the grid width flag override the config', async () => {
      const outputPath = join(projectDir, 'wide.tex');
      await runConvert(inputPath, { output: outputPath, project: projectDir, gridWidth: 21 }, silent);

      const lines = readFileSync(outputPath, 'utf-8').split('\n');
      assert.equal(lines[6], '\\缩进[2]\\双列{\\右小列{甲乙丙丁戊己}\\左小列{}}');
    });

    it('throws FileAccessError for a missing input', async () => {
      await assert.rejects(
        runConvert(join(projectDir, 'missing.tex'), { output: join(projectDir, 'x.tex'), project: projectDir }, silent),
        (err: unknown) => err instanceof FileAccessError && err.code === 'ERR_FILE_UNREADABLE'
      );
    });
  });

  describe('formatSummary', () => {
    it('lists counts under the paths', () => {
      const lines = formatSummary({
        inputPath: '/books/a.tex',
        outputPath: '/books/b.tex',
        plugin: 'siku-mulu',
        gridWidth: 21,
        blockCounts: { chapter: 1, text: 2 },
        blocks: 3,
        columns: 4,
        characters: 100,
      });
      assert.deepEqual(lines, [
        'Converted /books/a.tex → /books/b.tex',
        '  Plugin: siku-mulu',
        '  Grid width: 21',
        '  Blocks: 3',
        '    chapter: 1',
        '    text: 2',
        '  Columns: 4',
        '  Characters: 100',
      ]);
    });
  });

  describe('convert command', () => {
    it('parses flags and writes the output', async () => {
      const outputPath = join(projectDir, 'cli.tex');
      await convertCommand.parseAsync(
        [inputPath, '-o', outputPath, '-q', '--log-level', 'silent', '--project', projectDir],
        { from: 'user' }
      );

      assert.ok(existsSync(outputPath));
      assert.equal(readFileSync(outputPath, 'utf-8'), EXPECTED);
    });
  });
});
