import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYAML } from 'yaml';
import { DEFAULT_GRID_WIDTH } from '../constants.js';
import { ConfigError } from '../errors/ConverterError.js';

export const CONFIG_DIR = '.guji-convert';
export const CONFIG_FILE = 'config.yaml';

/**
 * Converter configuration.
 *
 * YAML Location: .guji-convert/config.yaml
 *
 * Example config.yaml:
 *
 * ```yaml
 * gridWidth: 21
 * plugin: siku-mulu          # built-in name or path to a plugin module
 * templates:
 *   四库全书文津阁: SiKuWenJinGe
 * removePackages:
 *   - xcolor
 * ```
 *
 * CLI flags override every field.
 */
export interface ConverterConfig {
  /** Character slots per column before indent is subtracted */
  gridWidth: number;
  /** Built-in plugin name, or a module path relative to the project */
  plugin?: string;
  /** Extra template mappings, applied over the core and plugin tables */
  templates: Record<string, string>;
  /** Extra \usepackage names to drop from the preamble */
  removePackages: string[];
}

export const DEFAULT_CONFIG: ConverterConfig = {
  gridWidth: DEFAULT_GRID_WIDTH,
  templates: {},
  removePackages: [],
};

function invalid(message: string, filePath: string): ConfigError {
  return new ConfigError(`Config error: ${message}`, 'ERR_CONFIG_INVALID', { filePath });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load config from `<projectPath>/.guji-convert/config.yaml`.
 *
 * Missing file → defaults. Unparseable YAML → warning and defaults.
 * Parsed but invalid values THROW ConfigError.
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): ConverterConfig {
  const yamlPath = join(projectPath, CONFIG_DIR, CONFIG_FILE);
  if (!existsSync(yamlPath)) {
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = parseYAML(readFileSync(yamlPath, 'utf-8'));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse config.yaml: ${error.message}`);
    logger.warn('Using default configuration');
    return DEFAULT_CONFIG;
  }

  // Empty or comment-only file
  if (parsed === null || parsed === undefined) {
    return DEFAULT_CONFIG;
  }

  return validateConfig(parsed, yamlPath);
}

/**
 * Validate a parsed config object and merge it with defaults.
 * THROWS ConfigError on the first invalid field.
 */
export function validateConfig(raw: unknown, filePath = CONFIG_FILE): ConverterConfig {
  if (!isRecord(raw)) {
    throw invalid(`config must be a mapping, got ${Array.isArray(raw) ? 'array' : typeof raw}`, filePath);
  }

  const config: ConverterConfig = {
    gridWidth: DEFAULT_CONFIG.gridWidth,
    templates: { ...DEFAULT_CONFIG.templates },
    removePackages: [...DEFAULT_CONFIG.removePackages],
  };

  const { gridWidth, plugin, templates, removePackages } = raw;

  if (gridWidth !== undefined && gridWidth !== null) {
    if (typeof gridWidth !== 'number' || !Number.isInteger(gridWidth) || gridWidth <= 0) {
      throw invalid(`gridWidth must be a positive integer, got ${JSON.stringify(gridWidth)}`, filePath);
    }
    config.gridWidth = gridWidth;
  }

  if (plugin !== undefined && plugin !== null) {
    if (typeof plugin !== 'string' || !plugin.trim()) {
      throw invalid('plugin must be a non-empty string', filePath);
    }
    config.plugin = plugin;
  }

  if (templates !== undefined && templates !== null) {
    if (!isRecord(templates)) {
      throw invalid(`templates must be a mapping, got ${Array.isArray(templates) ? 'array' : typeof templates}`, filePath);
    }
    for (const [name, target] of Object.entries(templates)) {
      if (typeof target !== 'string' || !target.trim()) {
        throw invalid(`templates.${name} must be a non-empty string`, filePath);
      }
      config.templates[name] = target;
    }
  }

  if (removePackages !== undefined && removePackages !== null) {
    if (!Array.isArray(removePackages)) {
      throw invalid(`removePackages must be an array, got ${typeof removePackages}`, filePath);
    }
    removePackages.forEach((pkg: unknown, i: number) => {
      if (typeof pkg !== 'string' || !pkg.trim()) {
        throw invalid(`removePackages[${i}] must be a non-empty string`, filePath);
      }
      config.removePackages.push(pkg);
    });
  }

  return config;
}
