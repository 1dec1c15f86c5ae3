/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { ConverterError } from '@guji-convert/core';

/**
 * Print a standardized error message and exit.
 *
 * @example
 * exitWithError('Input file not found: book.tex', [
 *   'Check the path passed to guji-convert convert'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[], exitFn: (code: number) => never = process.exit): never {
  console.error(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    console.error('');
    for (const step of nextSteps) {
      console.error(`→ ${step}`);
    }
  }

  return exitFn(1);
}

/**
 * Title and next steps for any thrown value; ConverterError supplies its suggestion.
 */
export function describeError(err: unknown): { title: string; nextSteps: string[] } {
  if (err instanceof ConverterError) {
    return { title: `${err.message} [${err.code}]`, nextSteps: err.suggestion ? [err.suggestion] : [] };
  }
  return { title: err instanceof Error ? err.message : String(err), nextSteps: [] };
}
