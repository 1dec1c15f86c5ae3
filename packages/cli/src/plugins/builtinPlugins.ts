/**
 * Built-in plugin registry — maps plugin names to factory functions.
 *
 * Each entry creates a fresh plugin instance. Names are what `--plugin` and
 * `plugin:` in .guji-convert/config.yaml accept besides module paths.
 */

import type { ConverterPlugin } from '@guji-convert/types';
import { SikuMuluPlugin } from '@guji-convert/core';

export const BUILTIN_PLUGINS: Record<string, () => ConverterPlugin> = {
  'siku-mulu': () => new SikuMuluPlugin(),
};
