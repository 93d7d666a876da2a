export const TaskStatus = {
  Incomplete: 'incomplete',
  Partial: 'partial',
  Done: 'done',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/** Checkbox symbol written between the brackets of a task line */
export function statusSymbol(status: TaskStatus): string {
  switch (status) {
    case TaskStatus.Done: return 'X';
    case TaskStatus.Partial: return 'O';
    case TaskStatus.Incomplete: return ' ';
  }
}

/** Only Done counts as complete; Partial is still open work. */
export function isComplete(status: TaskStatus): boolean {
  return status === TaskStatus.Done;
}

/**
 * Map the content of a `[ ]` checkbox to a status.
 * Returns null for anything other than X, O or blank.
 */
export function statusFromSymbol(symbol: string): TaskStatus | null {
  switch (symbol.trim().toUpperCase()) {
    case 'X': return TaskStatus.Done;
    case 'O': return TaskStatus.Partial;
    case '': return TaskStatus.Incomplete;
    default: return null;
  }
}
