/**
 * Option parsing shared by convert and inspect
 */

import { InvalidArgumentError } from 'commander';
import { isLogLevel, type LogLevel } from '@guji-convert/core';

/**
 * Commander argParser for --grid-width.
 */
export function parseGridWidth(value: string): number {
  const width = Number(value);
  if (!Number.isInteger(width) || width <= 0) {
    throw new InvalidArgumentError('Grid width must be a positive integer.');
  }
  return width;
}

/**
 * Determine log level from CLI options.
 * Priority: --log-level > --quiet > --verbose > default ('warnings')
 */
export function getLogLevel(options: { quiet?: boolean; verbose?: boolean; logLevel?: string }): LogLevel {
  if (options.logLevel && isLogLevel(options.logLevel)) {
    return options.logLevel;
  }
  if (options.quiet) return 'silent';
  if (options.verbose) return 'info';
  return 'warnings';
}
