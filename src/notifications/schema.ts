/**
 * Notifications Module - Schemas and Types
 *
 * Chat-agnostic description of the unlock notification, the pending
 * notification slot, and the channel port the Discord adapter implements.
 */
import type { Result } from "neverthrow";
import type { DeviceStatus } from "../sesame/index.js";
import type { ChatError } from "./errors.js";

// =============================================================================
// Notification Payload
// =============================================================================

/**
 * The single interactive control attached to a notification.
 */
export type NotificationAction = Readonly<{
  customId: string;
  label: string;
  disabled: boolean;
}>;

export type NotificationField = Readonly<{
  name: string;
  value: string;
}>;

/**
 * Message to post: an embed-like card plus one action button.
 */
export type NotificationPayload = Readonly<{
  title: string;
  description: string;
  /** RGB color as a number, e.g. 0xed4245 */
  color: number;
  fields: ReadonlyArray<NotificationField>;
  action: NotificationAction;
}>;

/**
 * Custom id carried by the "lock all" button and its interaction.
 */
export const LOCK_ALL_CUSTOM_ID = "lock_all";

export const LOCK_ALL_LABEL = "すべて施錠";

/**
 * Discord's red.
 */
export const ALERT_COLOR = 0xed4245;

// =============================================================================
// Pending Notification
// =============================================================================

/**
 * The one outstanding "devices unlocked" message. In memory only.
 */
export type PendingNotification = Readonly<{
  messageId: string;
  postedAt: number;
  /** Devices that were unlocked when the message was posted */
  devices: ReadonlyArray<DeviceStatus>;
}>;

// =============================================================================
// Channel Port
// =============================================================================

/**
 * What the notification logic needs from the chat platform.
 * NOT_FOUND from exists() means the message was deleted.
 */
export type ChatChannel = Readonly<{
  /** Check that the target channel is reachable and accepts messages */
  resolve: () => Promise<Result<void, ChatError>>;
  /** Post a payload, returning the new message id */
  send: (payload: NotificationPayload) => Promise<Result<string, ChatError>>;
  exists: (messageId: string) => Promise<Result<void, ChatError>>;
  /** Replace the message's control with the given (disabled) action */
  updateAction: (
    messageId: string,
    action: NotificationAction,
  ) => Promise<Result<void, ChatError>>;
}>;
