/**
 * Notifications Module - Service Layer
 *
 * Owns the single pending-notification slot. The poller and the
 * lock-all handler share one manager; both can suspend mid-operation,
 * so the slot is re-read after every await instead of being cached.
 */
import { type Result, err, ok } from "neverthrow";
import { createLogger } from "../logger.js";
import type { DeviceStatus } from "../sesame/index.js";
import type { ChatError } from "./errors.js";
import { formatChatError } from "./errors.js";
import type { ChatChannel, PendingNotification } from "./schema.js";
import { buildLockAllAction, buildUnlockNotification } from "./transform.js";

const log = createLogger("notifications");

export type NotificationManager = Readonly<{
  getPending: () => PendingNotification | null;
  clear: () => void;
  checkChannel: () => Promise<Result<void, ChatError>>;
  tryReuse: () => Promise<Result<boolean, ChatError>>;
  post: (
    devices: ReadonlyArray<DeviceStatus>,
  ) => Promise<Result<PendingNotification, ChatError>>;
  disableAction: (messageId: string) => Promise<void>;
}>;

export type NotificationManagerOptions = Readonly<{
  now?: () => number;
}>;

export function createNotificationManager(
  channel: ChatChannel,
  options: NotificationManagerOptions = {},
): NotificationManager {
  const now = options.now ?? Date.now;
  let pending: PendingNotification | null = null;

  function getPending(): PendingNotification | null {
    return pending;
  }

  function clear(): void {
    if (pending) {
      log.debug({ messageId: pending.messageId }, "Pending notification cleared");
    }
    pending = null;
  }

  async function checkChannel(): Promise<Result<void, ChatError>> {
    return channel.resolve();
  }

  /**
   * Probe whether the pending notification is still live.
   *
   * @returns ok(true) if the message still exists, ok(false) if the slot
   * is empty or the message was deleted (slot cleared), err otherwise;
 * a channel NOT_FOUND is an err and leaves the slot as it is
   */
  async function tryReuse(): Promise<Result<boolean, ChatError>> {
    const probed = pending;
    if (!probed) {
      return ok(false);
    }

    const result = await channel.exists(probed.messageId);

    if (result.isOk()) {
      return ok(true);
    }

    // A missing channel says nothing about the message
    if (result.error.type === "NOT_FOUND" && result.error.resource === "message") {
      // Another flow may have replaced the slot while we were waiting
      if (pending?.messageId === probed.messageId) {
        pending = null;
      }
      log.info(
        { messageId: probed.messageId },
        "Previous unlock notification is gone, slot cleared",
      );
      return ok(false);
    }

    return err(result.error);
  }

  /**
   * Post a new unlock notification and store it as the pending one.
   */
  async function post(
    devices: ReadonlyArray<DeviceStatus>,
  ): Promise<Result<PendingNotification, ChatError>> {
    const payload = buildUnlockNotification(devices);
    const result = await channel.send(payload);

    if (result.isErr()) {
      log.error(
        { errorType: result.error.type },
        `Failed to post unlock notification: ${formatChatError(result.error)}`,
      );
      return err(result.error);
    }

    const notification: PendingNotification = {
      messageId: result.value,
      postedAt: now(),
      devices,
    };
    pending = notification;

    log.info(
      { messageId: notification.messageId, devices: devices.map((d) => d.name) },
      "Unlock notification posted",
    );
    return ok(notification);
  }

  /**
   * Grey out the "lock all" button on a consumed notification.
   * Missing messages and missing permissions are logged, never thrown.
   */
  async function disableAction(messageId: string): Promise<void> {
    const result = await channel.updateAction(messageId, buildLockAllAction(true));

    if (result.isOk()) {
      log.debug({ messageId }, "Lock-all button disabled");
      return;
    }

    if (result.error.type === "NOT_FOUND") {
      log.warn({ messageId }, "Message to disable was not found");
      return;
    }

    log.error(
      { messageId, errorType: result.error.type },
      `Could not disable lock-all button: ${formatChatError(result.error)}`,
    );
  }

  return { getPending, clear, checkChannel, tryReuse, post, disableAction };
}
