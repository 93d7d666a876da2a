import type { Task } from './task.js';

export type SessionDate = string; // yyyy-MM-dd

export interface Session {
  readonly title: string;
  /** Set when the title is a valid yyyy-MM-dd date */
  readonly date: SessionDate | null;
  readonly tasks: Task[];
}

/** One user's session on a given date, as shown by `current` / `last`. */
export interface SessionViewEntry {
  readonly userName: string;
  readonly session: Session;
}

export interface SessionView {
  readonly date: SessionDate;
  readonly entries: readonly SessionViewEntry[];
}
