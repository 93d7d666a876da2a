/**
 * Identity rules used to match items during a merge. These are not value
 * equality: two tasks with the same name are "the same task" even when
 * their status differs.
 */

import type { Task } from '../types/task.js';
import type { Session } from '../types/session.js';
import type { User } from '../types/user.js';

export type SameIdentity<T> = (a: T, b: T) => boolean;

/** Exact, case-sensitive name match */
export const sameTask: SameIdentity<Task> = (a, b) => a.name === b.name;

/** Dated sessions match by date, anything else by title */
export const sameSession: SameIdentity<Session> = (a, b) =>
  a.date != null && b.date != null ? a.date === b.date : a.title === b.title;

export const sameUser: SameIdentity<User> = (a, b) => sameUserName(a.name, b.name);

export function sameUserName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
