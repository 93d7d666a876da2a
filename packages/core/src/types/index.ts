export { TaskStatus, statusSymbol, statusFromSymbol, isComplete } from './task-status.js';
export type { Task } from './task.js';
export type { Session, SessionDate, SessionView, SessionViewEntry } from './session.js';
export type { User, UserStats } from './user.js';
export type { BragDocument } from './document.js';
