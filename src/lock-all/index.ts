/**
 * Lock-All Module - Public API
 */

// Types
export type { LockAllInteraction, LockAllReport } from "./schema.js";
export type { LockAllDeps, LockAllHandler } from "./service.js";

// Service functions
export { createLockAllHandler } from "./service.js";

// Pure transformations
export {
  ALREADY_LOCKED_MESSAGE,
  formatLockAllReply,
  partitionLockResults,
} from "./transform.js";
