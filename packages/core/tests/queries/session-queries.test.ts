import { describe, it, expect } from 'vitest';
import {
  compareSessions,
  sortSessions,
  getSession,
  getTask,
  getUserCurrentSession,
  getUserLastSession,
  getSessionDates,
  getSessionView,
  getCurrentSession,
  getLastSession,
} from '../../src/queries/session-queries.js';
import { parseDocument, createSession, createUser } from '../../src/parsers/document-parser.js';
import { InsufficientHistoryError } from '../../src/errors.js';
import { SAMPLE_DOCUMENT } from '../fixtures.js';

describe('sortSessions', () => {
  it('orders dated sessions and puts undated ones last, in input order', () => {
    const sessions = ['Notes', '2026-03-02', 'Ideas', '2026-01-05', '2026-02-23'].map(t => createSession(t));
    expect(sortSessions(sessions).map(s => s.title)).toEqual([
      '2026-01-05', '2026-02-23', '2026-03-02', 'Notes', 'Ideas',
    ]);
  });

  it('does not reorder the input', () => {
    const sessions = [createSession('2026-03-02'), createSession('2026-01-05')];
    sortSessions(sessions);
    expect(sessions.map(s => s.title)).toEqual(['2026-03-02', '2026-01-05']);
  });

  it('compares antisymmetrically', () => {
    const dated = createSession('2026-03-02');
    const undated = createSession('Notes');
    expect(compareSessions(dated, undated)).toBe(-1);
    expect(compareSessions(undated, dated)).toBe(1);
    expect(compareSessions(undated, createSession('Ideas'))).toBe(0);
  });
});

describe('lookups', () => {
  const doc = parseDocument(SAMPLE_DOCUMENT);
  const ada = doc.users[0] ?? createUser('missing');

  it('finds a session by date', () => {
    expect(getSession(ada, '2026-02-23')?.tasks.map(t => t.name)).toEqual(['Plan sprint']);
    expect(getSession(ada, '1999-01-01')).toBeNull();
  });

  it('finds a task by name', () => {
    const session = getSession(ada, '2026-03-02') ?? createSession('missing');
    expect(getTask(session, 'Fix parser')?.name).toBe('Fix parser');
    expect(getTask(session, 'fix parser')).toBeNull();
  });
});

describe('user current and last session', () => {
  it('picks the latest and second-latest dated sessions', () => {
    const user = createUser('Ada');
    user.sessions.push(createSession('2026-03-02'), createSession('Notes'), createSession('2026-03-09'), createSession('2026-02-23'));
    expect(getUserCurrentSession(user)?.title).toBe('2026-03-09');
    expect(getUserLastSession(user)?.title).toBe('2026-03-02');
  });

  it('returns null without enough dated sessions', () => {
    const user = createUser('Ada');
    user.sessions.push(createSession('Notes'));
    expect(getUserCurrentSession(user)).toBeNull();

    user.sessions.push(createSession('2026-03-02'));
    expect(getUserCurrentSession(user)?.title).toBe('2026-03-02');
    expect(getUserLastSession(user)).toBeNull();
  });
});

describe('document current and last session', () => {
  const doc = parseDocument(SAMPLE_DOCUMENT);

  it('collects distinct dates in order', () => {
    expect(getSessionDates(doc)).toEqual(['2026-02-23', '2026-03-02']);
  });

  it('returns every user with a session on the latest date', () => {
    const view = getCurrentSession(doc);
    expect(view.date).toBe('2026-03-02');
    expect(view.entries.map(e => e.userName)).toEqual(['Ada Lovelace', 'Grace']);
  });

  it('leaves out users without a session on the second-latest date', () => {
    const view = getLastSession(doc);
    expect(view.date).toBe('2026-02-23');
    expect(view.entries.map(e => e.userName)).toEqual(['Ada Lovelace']);
    expect(view.entries[0]?.session.tasks.map(t => t.name)).toEqual(['Plan sprint']);
  });

  it('builds a view for any date', () => {
    expect(getSessionView(doc, '1999-01-01')).toEqual({ date: '1999-01-01', entries: [] });
  });

  it('fails with InsufficientHistoryError when there are too few dates', () => {
    const empty = parseDocument('# Ada\n## Goals\n- A');
    expect(() => getCurrentSession(empty)).toThrow(InsufficientHistoryError);

    const single = parseDocument('# Ada\n## 2026-03-02\n- A\n# Grace\n## 2026-03-02\n- B');
    expect(getCurrentSession(single).entries).toHaveLength(2);
    expect(() => getLastSession(single)).toThrow('Need at least 2 dated session(s), found 1');
  });
});
