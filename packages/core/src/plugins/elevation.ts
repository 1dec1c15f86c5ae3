/**
 * Elevation (taitou) commands inside annotation text.
 *
 * Each command ends the current sub-column and sets a new absolute indent:
 *
 *   \单抬               → -1
 *   \平抬               → 0
 *   \相对抬头[N]{text}  → base - N, starting with `text`
 *   \國朝               → the two characters 國朝 at the current indent
 *   \\                  → break only, indent unchanged
 *
 * Segments carry indentDelta relative to the annotation's base indent.
 */

import type { Segment } from '@guji-convert/types';
import { extractBraceContent } from '../text/markup.js';

export const SINGLE_ELEVATION = '\\单抬';
export const LEVEL_ELEVATION = '\\平抬';
export const RELATIVE_ELEVATION = '\\相对抬头';
export const DYNASTY_MARKER = '\\國朝';
export const LINE_BREAK = '\\\\';

/** Searched in this order; ties go to the earlier entry */
const COMMANDS = [RELATIVE_ELEVATION, SINGLE_ELEVATION, LEVEL_ELEVATION, DYNASTY_MARKER, LINE_BREAK];

const DYNASTY_TEXT = '國朝';

interface PendingSegment extends Segment {
  /** Marks "the next segment forces a break"; merged away before returning */
  placeholder?: boolean;
}

function findEarliest(text: string): { command: string; pos: number } | null {
  let best: { command: string; pos: number } | null = null;
  for (const command of COMMANDS) {
    const pos = text.indexOf(command);
    if (pos !== -1 && (best === null || pos < best.pos)) {
      best = { command, pos };
    }
  }
  return best;
}

export function hasElevationCommands(text: string): boolean {
  return COMMANDS.some(command => text.includes(command));
}

export function expandElevation(text: string, baseIndent: number): Segment[] {
  if (!hasElevationCommands(text)) {
    return [{ text, indentDelta: 0, forceBreak: false }];
  }

  const pending: PendingSegment[] = [];
  let remaining = text;
  let current = baseIndent;

  while (remaining) {
    const found = findEarliest(remaining);
    if (!found) {
      const rest = remaining.trim();
      if (rest) pending.push({ text: rest, indentDelta: current - baseIndent, forceBreak: false });
      break;
    }

    const before = remaining.slice(0, found.pos).trim();
    if (before) {
      pending.push({ text: before, indentDelta: current - baseIndent, forceBreak: false });
    }
    const after = remaining.slice(found.pos + found.command.length).trimStart();

    if (found.command === RELATIVE_ELEVATION) {
      const n = /^\[(\d+)\]/.exec(after);
      const arg = n ? extractBraceContent(after, n[0].length) : null;
      if (n && arg && arg.closed && arg.content) {
        const target = baseIndent - parseInt(n[1], 10);
        pending.push({ text: arg.content, indentDelta: target - baseIndent, forceBreak: true });
        remaining = after.slice(arg.end).trimStart();
        current = target;
      } else {
        remaining = after;
      }
      continue;
    }

    if (found.command === DYNASTY_MARKER) {
      // Same as \相对抬头[1]{國朝} in the main text, but inside annotations the
      // rendered output keeps the current indent.
      pending.push({ text: DYNASTY_TEXT, indentDelta: current - baseIndent, forceBreak: true });
      remaining = after;
      continue;
    }

    if (found.command === SINGLE_ELEVATION) {
      current = -1;
    } else if (found.command === LEVEL_ELEVATION) {
      current = 0;
    }
    remaining = after;

    if (remaining.trim()) {
      pending.push({ text: '', indentDelta: current - baseIndent, forceBreak: true, placeholder: true });
    }
  }

  return mergePlaceholders(pending);
}

/**
 * Hands each placeholder's break and indent to the segment after it.
 */
function mergePlaceholders(pending: PendingSegment[]): Segment[] {
  const merged: Segment[] = [];
  for (let i = 0; i < pending.length; i++) {
    const segment = pending[i];
    if (segment.placeholder) {
      const next = pending[i + 1];
      if (next && !next.placeholder) {
        // A segment that already breaks carries its own indent
        const indentDelta = next.forceBreak ? next.indentDelta : segment.indentDelta;
        merged.push({ text: next.text, indentDelta, forceBreak: true });
        i++;
      }
      continue;
    }
    merged.push({ text: segment.text, indentDelta: segment.indentDelta, forceBreak: segment.forceBreak });
  }
  return merged;
}
