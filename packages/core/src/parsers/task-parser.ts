/**
 * Parses one checklist line of a session block:
 *   [- | * | N.] [[X|O| ]] name [-- comment]
 * The bullet and the checkbox are both optional. A missing checkbox means
 * the task is incomplete.
 */

import type { Task } from '../types/task.js';
import { TaskStatus, statusFromSymbol } from '../types/task-status.js';
import { ParseError } from '../errors.js';

/** Name used by the session template for "write your tasks here" */
export const PLACEHOLDER_TASK = '...';

export const COMMENT_SEPARATOR = '--';

// Em-dash, and the same character mis-decoded as Latin-1 in older files
const LONG_DASH_RE = /â€”|—/g;
// Bullet or ordinal marker, only when followed by whitespace, a checkbox or nothing
const MARKER_RE = /^(?:[-*]|\d+\.)(?=\s|\[|$)\s*/;
// Single-character checkbox; `[link](...)` style text is not a checkbox
const CHECKBOX_RE = /^\[(\s*\S?\s*)\]\s*/;

/** True when `text` would be read back as a checkbox at the start of a task */
export function startsWithCheckbox(text: string): boolean {
  return CHECKBOX_RE.test(text);
}

/** Replace legacy long dashes with the `--` comment separator */
export function normalizeDashes(line: string): string {
  return line.replace(LONG_DASH_RE, COMMENT_SEPARATOR);
}

/**
 * Parse a checklist line into a Task.
 * Returns null for lines that carry no task (empty name or the `...` placeholder).
 * Throws ParseError when the checkbox holds an unknown symbol.
 *
 * @param lineNumber - 1-based position in the document, used in error messages.
 */
export function parseTaskLine(line: string, lineNumber?: number): Task | null {
  let rest = normalizeDashes(line).trim().replace(MARKER_RE, '');

  let status: TaskStatus = TaskStatus.Incomplete;
  const checkbox = CHECKBOX_RE.exec(rest);
  if (checkbox) {
    const symbol = checkbox[1] ?? '';
    const parsed = statusFromSymbol(symbol);
    if (parsed == null) {
      throw new ParseError(`Invalid status symbol '${symbol}'`, line, lineNumber ?? null);
    }
    status = parsed;
    rest = rest.slice((checkbox[0] ?? '').length);
  }

  const sep = rest.indexOf(COMMENT_SEPARATOR);
  const name = (sep >= 0 ? rest.slice(0, sep) : rest).trim();
  const comment = sep >= 0 ? rest.slice(sep + COMMENT_SEPARATOR.length).trim() : '';

  if (!name || name === PLACEHOLDER_TASK) return null;
  return { name, status, comment };
}
