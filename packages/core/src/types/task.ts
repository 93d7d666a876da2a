import type { TaskStatus } from './task-status.js';

/** Matched by name (exact, case-sensitive) when documents are merged. */
export interface Task {
  readonly name: string;
  status: TaskStatus;
  comment: string;
}
