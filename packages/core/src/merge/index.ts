export { reconcile } from './reconcile.js';
export { sameTask, sameSession, sameUser, sameUserName } from './identity.js';
export type { SameIdentity } from './identity.js';
export {
  updateTask, updateSession, updateUser, updateDocument,
  cloneTask, cloneSession, cloneUser,
} from './update.js';
