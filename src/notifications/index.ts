/**
 * Notifications Module - Public API
 *
 * Exports types, service functions, and transformations for the notifications module.
 */

// Types
export type {
  ChatChannel,
  NotificationAction,
  NotificationField,
  NotificationPayload,
  PendingNotification,
} from "./schema.js";

export { ALERT_COLOR, LOCK_ALL_CUSTOM_ID, LOCK_ALL_LABEL } from "./schema.js";

// Error types
export type { ChatError } from "./errors.js";

export {
  channelUnavailable,
  formatChatError,
  notFound,
  permissionDenied,
  sendFailed,
} from "./errors.js";

// Service functions
export type {
  NotificationManager,
  NotificationManagerOptions,
} from "./service.js";

export { createNotificationManager } from "./service.js";

// Pure transformations
export { buildLockAllAction, buildUnlockNotification } from "./transform.js";
