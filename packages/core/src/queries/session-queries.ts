import type { Task } from '../types/task.js';
import type { Session, SessionDate, SessionView, SessionViewEntry } from '../types/session.js';
import type { User } from '../types/user.js';
import type { BragDocument } from '../types/document.js';
import { InsufficientHistoryError } from '../errors.js';

/**
 * Chronological order; undated sessions go after every dated one.
 * Two undated sessions compare equal so a stable sort keeps their order.
 */
export function compareSessions(a: Session, b: Session): number {
  if (a.date == null || b.date == null) {
    return (a.date == null ? 1 : 0) - (b.date == null ? 1 : 0);
  }
  return a.date < b.date ? -1 : a.date > b.date ? 1 : 0;
}

/** Sorted copy; the input array is left alone */
export function sortSessions(sessions: readonly Session[]): Session[] {
  return [...sessions].sort(compareSessions);
}

export function getSession(user: User, date: SessionDate): Session | null {
  return user.sessions.find(s => s.date === date) ?? null;
}

export function getTask(session: Session, name: string): Task | null {
  return session.tasks.find(t => t.name === name) ?? null;
}

function datedSessions(user: User): Session[] {
  return sortSessions(user.sessions.filter(s => s.date != null));
}

/** The user's latest dated session, or null if there is none */
export function getUserCurrentSession(user: User): Session | null {
  return datedSessions(user).at(-1) ?? null;
}

/** The user's second-latest dated session, or null */
export function getUserLastSession(user: User): Session | null {
  return datedSessions(user).at(-2) ?? null;
}

/** Distinct session dates across all users, ascending */
export function getSessionDates(doc: BragDocument): SessionDate[] {
  const dates = new Set<SessionDate>();
  for (const user of doc.users) {
    for (const session of user.sessions) {
      if (session.date != null) dates.add(session.date);
    }
  }
  return [...dates].sort();
}

/** Every user's session on `date`, in user order. Users without one are left out. */
export function getSessionView(doc: BragDocument, date: SessionDate): SessionView {
  const entries: SessionViewEntry[] = [];
  for (const user of doc.users) {
    const session = getSession(user, date);
    if (session) entries.push({ userName: user.name, session });
  }
  return { date, entries };
}

/** Latest date in the document. Throws InsufficientHistoryError when there is none. */
export function getCurrentSessionDate(doc: BragDocument): SessionDate {
  const dates = getSessionDates(doc);
  const current = dates.at(-1);
  if (current === undefined) throw new InsufficientHistoryError(1, dates.length);
  return current;
}

/** Second-latest date in the document. Throws InsufficientHistoryError with fewer than two. */
export function getLastSessionDate(doc: BragDocument): SessionDate {
  const dates = getSessionDates(doc);
  const last = dates.at(-2);
  if (last === undefined) throw new InsufficientHistoryError(2, dates.length);
  return last;
}

export function getCurrentSession(doc: BragDocument): SessionView {
  return getSessionView(doc, getCurrentSessionDate(doc));
}

export function getLastSession(doc: BragDocument): SessionView {
  return getSessionView(doc, getLastSessionDate(doc));
}
