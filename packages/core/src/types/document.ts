import type { User } from './user.js';

export interface BragDocument {
  /** First-seen order; names are unique case-insensitively */
  readonly users: User[];
}
