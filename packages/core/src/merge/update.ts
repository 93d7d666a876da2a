/**
 * Deep union of two documents. The base is mutated: incoming status and
 * comment win on a task name collision, new users/sessions/tasks are
 * appended as copies, and nothing is deleted.
 */

import type { Task } from '../types/task.js';
import type { Session } from '../types/session.js';
import type { User } from '../types/user.js';
import type { BragDocument } from '../types/document.js';
import { reconcile } from './reconcile.js';
import { sameTask, sameSession, sameUser } from './identity.js';

export function cloneTask(task: Task): Task {
  return { name: task.name, status: task.status, comment: task.comment };
}

export function cloneSession(session: Session): Session {
  return { title: session.title, date: session.date, tasks: session.tasks.map(cloneTask) };
}

export function cloneUser(user: User): User {
  return {
    name: user.name,
    email: user.email,
    goals: cloneSession(user.goals),
    sessions: user.sessions.map(cloneSession),
  };
}

/** Overwrite status and comment; the name never changes */
export function updateTask(target: Task, source: Task): Task {
  target.status = source.status;
  target.comment = source.comment;
  return target;
}

export function updateSession(target: Session, source: Session): Session {
  reconcile(target.tasks, source.tasks, sameTask, updateTask, cloneTask);
  return target;
}

export function updateUser(target: User, source: User): User {
  if (source.email) target.email = source.email;
  updateSession(target.goals, source.goals);
  reconcile(target.sessions, source.sessions, sameSession, updateSession, cloneSession);
  return target;
}

/** Merge `incoming` into `base` and return `base` */
export function updateDocument(base: BragDocument, incoming: BragDocument): BragDocument {
  reconcile(base.users, incoming.users, sameUser, updateUser, cloneUser);
  return base;
}
