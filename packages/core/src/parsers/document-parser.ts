/**
 * Parses a brag document:
 *
 *   # Name <email>
 *   ## Goals
 *   - [O] Standing objective -- comment
 *   ## 2026-03-02
 *   - [X] Something shipped
 *
 * Text before the first user header, and inside a user block before its
 * first session header, is ignored. Repeated users, sessions and task names
 * are folded together with the merge rules.
 */

import type { Task } from '../types/task.js';
import type { Session } from '../types/session.js';
import type { User } from '../types/user.js';
import type { BragDocument } from '../types/document.js';
import { MalformedHeaderError } from '../errors.js';
import { reconcile } from '../merge/reconcile.js';
import { sameTask, sameSession, sameUser } from '../merge/identity.js';
import { updateTask, updateSession, updateUser } from '../merge/update.js';
import { parseSessionDate } from './date-parser.js';
import { parseTaskLine } from './task-parser.js';

export const GOALS_TITLE = 'Goals';

// `#hashtag` is not a header; the marker must be followed by whitespace or end the line
const USER_HEADER_RE = /^#(?=\s|$)(.*)$/;
const SESSION_HEADER_RE = /^##(?=\s|$)(.*)$/;
const NAME_EMAIL_RE = /^([^<]*)<([^>]*)>/;
const RULE_RE = /^\s*---/;

export interface UserHeader {
  readonly name: string;
  readonly email: string | null;
}

/** True when a session header names the goals block ("Goals", "My goals", ...) */
export function isGoalsTitle(title: string): boolean {
  return title.toLowerCase().includes('goals');
}

/** Build an empty session from its header text */
export function createSession(title: string, tasks: Task[] = []): Session {
  const trimmed = title.trim();
  if (isGoalsTitle(trimmed)) {
    return { title: GOALS_TITLE, date: null, tasks };
  }
  return { title: trimmed, date: parseSessionDate(trimmed), tasks };
}

export function createUser(name: string, email: string | null = null): User {
  return { name, email, goals: createSession(GOALS_TITLE), sessions: [] };
}

/**
 * Split `Name <email>` on the first angle-bracket pair.
 * Returns null when there is no name.
 */
export function parseUserHeader(text: string): UserHeader | null {
  const trimmed = text.trim();
  const m = NAME_EMAIL_RE.exec(trimmed);
  const name = (m ? m[1] ?? '' : trimmed).trim();
  if (!name) return null;

  const email = m ? (m[2] ?? '').trim() : '';
  return { name, email: email || null };
}

/** Add a task to a session, updating an existing task of the same name */
function addTask(session: Session, task: Task): void {
  reconcile(session.tasks, [task], sameTask, updateTask);
}

/** Parse raw document text into users, sessions and tasks. */
export function parseDocument(text: string): BragDocument {
  const doc: BragDocument = { users: [] };
  let user: User | null = null;
  let session: Session | null = null;

  const lines = text.split(/\r?\n/);
  lines.forEach((line, index) => {
    const lineNumber = index + 1;

    const sessionHeader = SESSION_HEADER_RE.exec(line);
    if (sessionHeader) {
      if (!user) return;
      const created = createSession(sessionHeader[1] ?? '');
      session = created.title === GOALS_TITLE ? user.goals : addSession(user, created);
      return;
    }

    const userHeader = USER_HEADER_RE.exec(line);
    if (userHeader) {
      const header = parseUserHeader(userHeader[1] ?? '');
      if (!header) throw new MalformedHeaderError(lineNumber);
      user = addUser(doc, createUser(header.name, header.email));
      session = null;
      return;
    }

    if (!session || !line.trim() || RULE_RE.test(line) || line.trimStart().startsWith('#')) return;

    const task = parseTaskLine(line, lineNumber);
    if (task) addTask(session, task);
  });

  return doc;
}

/** Parse a single session block (`## title` followed by task lines) */
export function parseSession(text: string): Session {
  const [first = '', ...rest] = text.split(/\r?\n/);
  const header = SESSION_HEADER_RE.exec(first);
  const session = createSession(header ? header[1] ?? '' : first);
  rest.forEach((line, index) => {
    if (!line.trim() || RULE_RE.test(line) || line.trimStart().startsWith('#')) return;
    const task = parseTaskLine(line, index + 2);
    if (task) addTask(session, task);
  });
  return session;
}

/** Returns the user's session matching `session`, adding it if new */
function addSession(user: User, session: Session): Session {
  reconcile(user.sessions, [session], sameSession, updateSession);
  return user.sessions.find(s => sameSession(s, session)) ?? session;
}

function addUser(doc: BragDocument, user: User): User {
  reconcile(doc.users, [user], sameUser, updateUser);
  return doc.users.find(u => sameUser(u, user)) ?? user;
}
