/**
 * Plugin loader tests
 *
 * A plugin module must export exactly one BaseConverterPlugin subclass;
 * built-in names resolve before paths.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { PluginLoadError, SikuMuluPlugin } from '@guji-convert/core';
import { loadPluginModule, resolvePlugin } from '../src/plugins/pluginLoader.js';
import { BUILTIN_PLUGINS } from '../src/plugins/builtinPlugins.js';

const fixturesDir = fileURLToPath(new URL('./fixtures/plugins/', import.meta.url));

function isPluginLoadError(code: string) {
  return (err: unknown): boolean => err instanceof PluginLoadError && err.code === code;
}

describe('loadPluginModule', () => {
  it('instantiates the single plugin class, counting a default re-export once', async () => {
    const plugin = await loadPluginModule(join(fixturesDir, 'single.ts'));
    assert.equal(plugin.metadata.name, 'commentary');
    assert.deepEqual(plugin.getTemplateMapping(), { '注疏本': 'ZhuShu' });
  });

  it('fails when the module has no plugin class', async () => {
    await assert.rejects(loadPluginModule(join(fixturesDir, 'none.ts')), isPluginLoadError('ERR_PLUGIN_NOT_FOUND'));
  });

  it('fails when the module has several plugin classes', async () => {
    await assert.rejects(loadPluginModule(join(fixturesDir, 'double.ts')), (err: unknown) => {
      assert.ok(err instanceof PluginLoadError);
      assert.equal(err.code, 'ERR_PLUGIN_AMBIGUOUS');
      assert.deepEqual(err.context.classes, ['FirstPlugin', 'SecondPlugin']);
      return true;
    });
  });

  it('fails when the module throws on import', async () => {
    await assert.rejects(loadPluginModule(join(fixturesDir, 'broken.ts')), (err: unknown) => {
      assert.ok(err instanceof PluginLoadError);
      assert.equal(err.code, 'ERR_PLUGIN_IMPORT');
      assert.ok(err.message.endsWith('fixture failed to initialize'));
      return true;
    });
  });

  it('fails when the file does not exist', async () => {
    await assert.rejects(loadPluginModule(join(fixturesDir, 'missing.ts')), (err: unknown) => {
      assert.ok(err instanceof PluginLoadError);
      assert.equal(err.code, 'ERR_PLUGIN_IMPORT');
      assert.equal(err.suggestion, 'Use a built-in plugin (siku-mulu) or a path to a module');
      return true;
    });
  });
});

describe('resolvePlugin', () => {
  it('returns undefined without a reference', async () => {
    assert.equal(await resolvePlugin(undefined, fixturesDir), undefined);
  });

  it('prefers built-in names', async () => {
    const plugin = await resolvePlugin('siku-mulu', fixturesDir);
    assert.ok(plugin instanceof SikuMuluPlugin);
  });

  it('resolves paths against the base directory', async () => {
    const plugin = await resolvePlugin('single.ts', fixturesDir);
    assert.equal(plugin?.metadata.name, 'commentary');
  });

  it('creates a fresh built-in instance per call', () => {
    const factory = BUILTIN_PLUGINS['siku-mulu'];
    assert.notEqual(factory(), factory());
  });
});
