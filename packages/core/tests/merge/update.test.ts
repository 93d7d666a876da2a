import { describe, it, expect } from 'vitest';
import { updateTask, updateSession, updateUser, updateDocument } from '../../src/merge/update.js';
import { sameSession, sameTask, sameUser } from '../../src/merge/identity.js';
import { parseDocument, createSession, createUser } from '../../src/parsers/document-parser.js';
import { serializeDocument } from '../../src/serializers/document-serializer.js';
import { TaskStatus } from '../../src/types/task-status.js';
import type { Task } from '../../src/types/task.js';
import { SAMPLE_DOCUMENT } from '../fixtures.js';

const task = (name: string, status: TaskStatus = TaskStatus.Incomplete, comment = ''): Task =>
  ({ name, status, comment });

describe('identity', () => {
  it('matches tasks by exact name', () => {
    expect(sameTask(task('A'), task('A', TaskStatus.Done))).toBe(true);
    expect(sameTask(task('A'), task('a'))).toBe(false);
  });

  it('matches users by name ignoring case', () => {
    expect(sameUser(createUser('Ada', 'x@example.com'), createUser('ADA'))).toBe(true);
    expect(sameUser(createUser('Ada'), createUser('Grace'))).toBe(false);
  });

  it('matches dated sessions by date and others by title', () => {
    expect(sameSession(createSession('2026-03-02'), createSession(' 2026-03-02'))).toBe(true);
    expect(sameSession(createSession('Notes'), createSession('Notes'))).toBe(true);
    expect(sameSession(createSession('Notes'), createSession('2026-03-02'))).toBe(false);
  });
});

describe('updateTask', () => {
  it('overwrites status and comment with the incoming values', () => {
    const base = task('Ship feature');
    updateTask(base, task('Ship feature', TaskStatus.Done, 'shipped today'));
    expect(base).toEqual({ name: 'Ship feature', status: TaskStatus.Done, comment: 'shipped today' });
  });

  it('clears the comment when the incoming task has none', () => {
    const base = task('A', TaskStatus.Partial, 'old note');
    updateTask(base, task('A', TaskStatus.Partial));
    expect(base.comment).toBe('');
  });
});

describe('updateSession', () => {
  it('keeps base order and appends new tasks last', () => {
    const base = createSession('2026-03-02', [task('A'), task('B')]);
    const incoming = createSession('2026-03-02', [task('B', TaskStatus.Done, 'done'), task('C')]);

    updateSession(base, incoming);
    expect(base.tasks).toEqual([
      task('A'),
      task('B', TaskStatus.Done, 'done'),
      task('C'),
    ]);
  });

  it('copies appended tasks', () => {
    const base = createSession('2026-03-02');
    const incoming = createSession('2026-03-02', [task('C')]);
    updateSession(base, incoming);

    incoming.tasks[0]!.comment = 'changed later';
    expect(base.tasks[0]?.comment).toBe('');
  });
});

describe('updateUser', () => {
  it('merges goals and sessions', () => {
    const base = createUser('Ada');
    base.goals.tasks.push(task('Goal 1'));
    base.sessions.push(createSession('2026-02-23', [task('A')]));

    const incoming = createUser('ada');
    incoming.goals.tasks.push(task('Goal 1', TaskStatus.Partial), task('Goal 2'));
    incoming.sessions.push(createSession('2026-03-02', [task('B')]), createSession('2026-02-23', [task('A', TaskStatus.Done)]));

    updateUser(base, incoming);
    expect(base.name).toBe('Ada');
    expect(base.goals.tasks).toEqual([task('Goal 1', TaskStatus.Partial), task('Goal 2')]);
    expect(base.sessions.map(s => s.date)).toEqual(['2026-02-23', '2026-03-02']);
    expect(base.sessions[0]?.tasks).toEqual([task('A', TaskStatus.Done)]);
  });

  it('takes a new email but never clears one', () => {
    const base = createUser('Ada', 'old@example.com');
    updateUser(base, createUser('Ada'));
    expect(base.email).toBe('old@example.com');

    updateUser(base, createUser('Ada', 'new@example.com'));
    expect(base.email).toBe('new@example.com');
  });
});

describe('updateDocument', () => {
  it('returns the base document', () => {
    const base = parseDocument(SAMPLE_DOCUMENT);
    expect(updateDocument(base, parseDocument('# Linus\n## 2026-03-02\n- A'))).toBe(base);
  });

  it('leaves a document unchanged when merged with a copy of itself', () => {
    const base = parseDocument(SAMPLE_DOCUMENT);
    const before = serializeDocument(base);

    updateDocument(base, parseDocument(SAMPLE_DOCUMENT));
    expect(serializeDocument(base)).toBe(before);

    updateDocument(base, base);
    expect(serializeDocument(base)).toBe(before);
  });

  it('appends new users after existing ones', () => {
    const base = parseDocument(SAMPLE_DOCUMENT);
    updateDocument(base, parseDocument('# Linus\n## 2026-03-02\n- A\n# GRACE\n## 2026-03-09\n- B'));

    expect(base.users.map(u => u.name)).toEqual(['Ada Lovelace', 'Grace', 'Linus']);
    expect(base.users[1]?.sessions.map(s => s.date)).toEqual(['2026-03-02', '2026-03-09']);
  });

  it('never removes users, sessions or tasks', () => {
    const base = parseDocument(SAMPLE_DOCUMENT);
    updateDocument(base, parseDocument('# Ada Lovelace\n## 2026-03-02\n- [X] Fix parser -- merged'));

    const ada = base.users[0];
    expect(base.users).toHaveLength(2);
    expect(ada?.sessions).toHaveLength(2);
    expect(ada?.goals.tasks).toHaveLength(2);
    expect(ada?.sessions[0]?.tasks).toEqual([
      task('Ship feature', TaskStatus.Done, 'shipped today'),
      task('Fix parser', TaskStatus.Done, 'merged'),
    ]);
  });

  it('is not commutative', () => {
    const a = () => parseDocument('# Ada\n## 2026-03-02\n- [X] A');
    const b = () => parseDocument('# Ada\n## 2026-03-02\n- [ ] A');

    expect(updateDocument(a(), b()).users[0]?.sessions[0]?.tasks[0]?.status).toBe(TaskStatus.Incomplete);
    expect(updateDocument(b(), a()).users[0]?.sessions[0]?.tasks[0]?.status).toBe(TaskStatus.Done);
  });

  it('does not alias users taken from the incoming document', () => {
    const base = parseDocument('');
    const incoming = parseDocument('# Ada\n## 2026-03-02\n- A');
    updateDocument(base, incoming);

    expect(base.users[0]).toEqual(incoming.users[0]);
    expect(base.users[0]).not.toBe(incoming.users[0]);
  });
});
