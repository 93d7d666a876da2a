/**
 * Builds the text a user edits for a new session: their unfinished goals,
 * their latest session and an empty session for today.
 */

import type { Session, SessionDate } from '../types/session.js';
import type { BragDocument } from '../types/document.js';
import { isComplete } from '../types/task-status.js';
import { PLACEHOLDER_TASK } from '../parsers/task-parser.js';
import { formatDate } from '../parsers/date-parser.js';
import { cloneTask } from '../merge/update.js';
import { serializeSession, USER_SEPARATOR } from '../serializers/document-serializer.js';
import { getSession, getSessionDates } from './session-queries.js';

/** A copy of the session holding only tasks that aren't Done */
export function unfinishedTasks(session: Session): Session {
  return {
    title: session.title,
    date: session.date,
    tasks: session.tasks.filter(t => !isComplete(t.status)).map(cloneTask),
  };
}

/**
 * Render the editing template. `today` defaults to the current local date.
 * The `- ...` placeholder is dropped again when the template is parsed.
 */
export function buildSessionTemplate(doc: BragDocument, today: SessionDate = formatDate(new Date())): string {
  const latest = getSessionDates(doc).at(-1) ?? null;

  const blocks = doc.users.map(user => {
    const parts = [`# ${user.name}`];

    const goals = unfinishedTasks(user.goals);
    if (goals.tasks.length > 0) parts.push(serializeSession(goals, { simple: true }));

    const previous = latest ? getSession(user, latest) : null;
    if (previous) parts.push(serializeSession(previous));

    if (latest !== today) parts.push(`## ${today}\n\n- ${PLACEHOLDER_TASK}`);
    return parts.join('\n\n');
  });

  return blocks.join(`\n\n${USER_SEPARATOR}\n\n`);
}
