export {
  serializeTask,
  serializeSession,
  serializeUser,
  serializeDocument,
  serializeSessionView,
  formatUserHeader,
  USER_SEPARATOR,
} from './document-serializer.js';
export type { TaskFormatOptions, SessionFormatOptions } from './document-serializer.js';
