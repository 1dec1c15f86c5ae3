/**
 * Plugin loading — resolves a plugin reference to one plugin instance.
 *
 * A reference is either a built-in name (see BUILTIN_PLUGINS) or a path to a
 * module. A module must export exactly one class extending BaseConverterPlugin;
 * none or several is a load-time failure.
 */

import { resolve } from 'path';
import { existsSync } from 'fs';
import { pathToFileURL } from 'url';
import type { ConverterPlugin } from '@guji-convert/types';
import { BaseConverterPlugin, PluginLoadError, isPluginClass } from '@guji-convert/core';
import { BUILTIN_PLUGINS } from './builtinPlugins.js';

/**
 * Import a plugin module and instantiate its single plugin class.
 */
export async function loadPluginModule(modulePath: string): Promise<ConverterPlugin> {
  const absolutePath = resolve(modulePath);
  if (!existsSync(absolutePath)) {
    throw new PluginLoadError(
      `Plugin module not found: ${modulePath}`,
      'ERR_PLUGIN_IMPORT',
      { filePath: absolutePath },
      `Use a built-in plugin (${Object.keys(BUILTIN_PLUGINS).join(', ')}) or a path to a module`
    );
  }

  let moduleExports: Record<string, unknown>;
  try {
    moduleExports = await import(pathToFileURL(absolutePath).href);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PluginLoadError(`Failed to import plugin ${modulePath}: ${message}`, 'ERR_PLUGIN_IMPORT', {
      filePath: absolutePath,
    });
  }

  // `export default X` next to `export { X }` is one implementation, not two
  const classes = [...new Set(Object.values(moduleExports).filter(isPluginClass))];

  if (classes.length === 0) {
    throw new PluginLoadError(
      `No ${BaseConverterPlugin.name} subclass found in ${modulePath}`,
      'ERR_PLUGIN_NOT_FOUND',
      { filePath: absolutePath },
      `Export a class that extends ${BaseConverterPlugin.name} from '@guji-convert/core'`
    );
  }
  if (classes.length > 1) {
    throw new PluginLoadError(
      `Multiple plugin classes found in ${modulePath}: ${classes.map(c => c.name).join(', ')}`,
      'ERR_PLUGIN_AMBIGUOUS',
      { filePath: absolutePath, classes: classes.map(c => c.name) },
      'Keep exactly one plugin class per module'
    );
  }

  const PluginClass = classes[0];
  return new PluginClass();
}

/**
 * Built-in name first, then module path relative to baseDir.
 * No reference means no plugin.
 */
export async function resolvePlugin(
  reference: string | undefined,
  baseDir: string
): Promise<ConverterPlugin | undefined> {
  if (!reference) return undefined;

  const factory = BUILTIN_PLUGINS[reference];
  if (factory) return factory();

  return loadPluginModule(resolve(baseDir, reference));
}
