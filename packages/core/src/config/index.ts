/**
 * Configuration loading utilities
 */
export { loadConfig, validateConfig, DEFAULT_CONFIG, CONFIG_DIR, CONFIG_FILE } from './ConfigLoader.js';
export type { ConverterConfig } from './ConfigLoader.js';
