export {
  compareSessions,
  sortSessions,
  getSession,
  getTask,
  getUserCurrentSession,
  getUserLastSession,
  getSessionDates,
  getSessionView,
  getCurrentSessionDate,
  getLastSessionDate,
  getCurrentSession,
  getLastSession,
} from './session-queries.js';
export { getUser, filterUsers, getUserStats, getDocumentStats } from './user-queries.js';
export type { StatsOptions, UserStatsEntry } from './user-queries.js';
export { unfinishedTasks, buildSessionTemplate } from './template.js';
