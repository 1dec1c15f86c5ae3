/**
 * Preamble translation: guji document class → guji-digital.
 */

const DOCUMENT_CLASS = /^(\\documentclass)\[(.+?)\]\{(guji|ltc-guji)\}/;

export const DIGITAL_CLASS = 'guji-digital';

export interface PreambleOptions {
  templateMap: Readonly<Record<string, string>>;
  removedPackages: readonly string[];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Rewrites the document class, drops unneeded \usepackage lines and comment
 * lines, and collapses runs of blank lines to one.
 */
export function convertPreamble(preamble: string, options: PreambleOptions): string {
  const removed = options.removedPackages.length > 0
    ? new RegExp(`^\\\\usepackage\\{(${options.removedPackages.map(escapeRegExp).join('|')})\\}`)
    : null;

  const kept: string[] = [];
  for (const line of preamble.split('\n')) {
    const m = DOCUMENT_CLASS.exec(line);
    if (m) {
      const template = options.templateMap[m[2]] ?? m[2];
      kept.push(`\\documentclass[${template}]{${DIGITAL_CLASS}}`);
      continue;
    }

    const trimmed = line.trim();
    if (removed?.test(trimmed)) continue;
    if (trimmed.startsWith('%')) continue;

    kept.push(line);
  }

  const cleaned: string[] = [];
  let previousEmpty = false;
  for (const line of kept) {
    const empty = !line.trim();
    if (empty && previousEmpty) continue;
    cleaned.push(line);
    previousEmpty = empty;
  }

  return cleaned.join('\n');
}
