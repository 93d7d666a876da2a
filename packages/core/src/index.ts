// Types
export { TaskStatus, statusSymbol, statusFromSymbol, isComplete } from './types/index.js';
export type { Task, Session, SessionDate, SessionView, SessionViewEntry, User, UserStats, BragDocument } from './types/index.js';

// Errors
export { BragError, ParseError, MalformedHeaderError, InsufficientHistoryError } from './errors.js';

// Parsers
export * from './parsers/index.js';

// Serializers
export * from './serializers/index.js';

// Merge
export * from './merge/index.js';

// Queries
export * from './queries/index.js';
