export { parseSessionDate, formatDate } from './date-parser.js';
export { parseTaskLine, normalizeDashes, startsWithCheckbox, PLACEHOLDER_TASK, COMMENT_SEPARATOR } from './task-parser.js';
export {
  parseDocument,
  parseSession,
  parseUserHeader,
  createSession,
  createUser,
  isGoalsTitle,
  GOALS_TITLE,
} from './document-parser.js';
export type { UserHeader } from './document-parser.js';
