/**
 * @guji-convert/types - Type definitions for the guji → guji-digital converter
 */

// Semantic blocks
export * from './blocks.js';

// Column records
export * from './columns.js';

// Plugin capability set
export * from './plugins.js';
