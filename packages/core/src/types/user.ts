import type { Session } from './session.js';

export interface User {
  readonly name: string;
  email: string | null;
  /** The user's "## Goals" block; empty when the document has none */
  readonly goals: Session;
  /** Dated (and ad-hoc undated) sessions in document order, sorted on output */
  readonly sessions: Session[];
}

export interface UserStats {
  readonly done: number;
  readonly partial: number;
  readonly missed: number;
  readonly total: number;
  /** done / (done + missed); 0 when both are zero */
  readonly completionRatio: number;
}
