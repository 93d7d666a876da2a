/**
 * Renders the object graph back to document text. Parsing the output gives
 * back the same users, sessions and tasks; whitespace and session order are
 * normalised.
 */

import type { Task } from '../types/task.js';
import type { Session, SessionView } from '../types/session.js';
import type { User } from '../types/user.js';
import type { BragDocument } from '../types/document.js';
import { TaskStatus, statusSymbol } from '../types/task-status.js';
import { COMMENT_SEPARATOR, startsWithCheckbox } from '../parsers/task-parser.js';
import { sortSessions } from '../queries/session-queries.js';

export const USER_SEPARATOR = '-'.repeat(60);

export interface TaskFormatOptions {
  /**
   * Drop the empty checkbox of incomplete tasks (goal lists, templates).
   * Kept when the name itself starts with something checkbox-shaped.
   */
  simple?: boolean;
}

export interface SessionFormatOptions extends TaskFormatOptions {
  /** Render the `## title` header (default true) */
  title?: boolean;
}

export function serializeTask(task: Task, options: TaskFormatOptions = {}): string {
  const bare = options.simple && task.status === TaskStatus.Incomplete && !startsWithCheckbox(task.name);
  let result = bare
    ? `- ${task.name}`
    : `- [${statusSymbol(task.status)}] ${task.name}`;

  if (task.comment) result += ` ${COMMENT_SEPARATOR} ${task.comment}`;
  return result;
}

export function serializeSession(session: Session, options: SessionFormatOptions = {}): string {
  const tasks = session.tasks.map(t => serializeTask(t, options)).join('\n');
  if (options.title === false) return tasks;
  return `## ${session.title}\n\n${tasks}`;
}

/** `Name` or `Name <email>` */
export function formatUserHeader(user: Pick<User, 'name' | 'email'>): string {
  return user.email ? `${user.name} <${user.email}>` : user.name;
}

export function serializeUser(user: User): string {
  const blocks = [`# ${formatUserHeader(user)}`];
  if (user.goals.tasks.length > 0) blocks.push(serializeSession(user.goals));
  for (const session of sortSessions(user.sessions)) {
    blocks.push(serializeSession(session));
  }
  return blocks.join('\n\n');
}

/** Whole document, users separated by a horizontal rule. No trailing newline. */
export function serializeDocument(doc: BragDocument): string {
  return doc.users.map(serializeUser).join(`\n\n${USER_SEPARATOR}\n\n`);
}

/** Each user's session for one date, without goals */
export function serializeSessionView(view: SessionView): string {
  return view.entries
    .map(({ userName, session }) => `# ${userName}\n\n${serializeSession(session)}`)
    .join('\n\n');
}
