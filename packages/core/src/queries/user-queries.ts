import type { Session, SessionDate } from '../types/session.js';
import type { User, UserStats } from '../types/user.js';
import type { BragDocument } from '../types/document.js';
import { TaskStatus } from '../types/task-status.js';
import { sameUserName } from '../merge/identity.js';
import { getSession } from './session-queries.js';

export function getUser(doc: BragDocument, name: string): User | null {
  return doc.users.find(u => sameUserName(u.name, name)) ?? null;
}

/**
 * Keep only the named users (case-insensitive), in document order.
 * The returned document shares its User objects with `doc`.
 */
export function filterUsers(doc: BragDocument, names: readonly string[]): BragDocument {
  return { users: doc.users.filter(u => names.some(n => sameUserName(u.name, n.trim()))) };
}

export interface StatsOptions {
  /** Only count the session on this date */
  date?: SessionDate;
}

/**
 * Task counts over the user's dated sessions (goals excluded).
 * Partial tasks are counted separately and left out of the ratio.
 */
export function getUserStats(user: User, options: StatsOptions = {}): UserStats {
  let sessions: Session[];
  if (options.date) {
    const session = getSession(user, options.date);
    sessions = session ? [session] : [];
  } else {
    sessions = user.sessions.filter(s => s.date != null);
  }

  const tasks = sessions.flatMap(s => s.tasks);
  const done = tasks.filter(t => t.status === TaskStatus.Done).length;
  const partial = tasks.filter(t => t.status === TaskStatus.Partial).length;
  const missed = tasks.filter(t => t.status === TaskStatus.Incomplete).length;

  return {
    done,
    partial,
    missed,
    total: tasks.length,
    completionRatio: done + missed === 0 ? 0 : done / (done + missed),
  };
}

export interface UserStatsEntry {
  readonly user: User;
  readonly stats: UserStats;
}

export function getDocumentStats(doc: BragDocument, options: StatsOptions = {}): UserStatsEntry[] {
  return doc.users.map(user => ({ user, stats: getUserStats(user, options) }));
}
