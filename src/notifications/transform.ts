/**
 * Notifications Module - Pure Transformations
 *
 * Builds the unlock notification payload.
 * No side effects, no I/O - just data in, data out.
 */
import type { DeviceStatus } from "../sesame/index.js";
import type { NotificationAction, NotificationPayload } from "./schema.js";
import { ALERT_COLOR, LOCK_ALL_CUSTOM_ID, LOCK_ALL_LABEL } from "./schema.js";

/**
 * The "lock all" button, enabled or greyed out.
 */
export function buildLockAllAction(disabled: boolean): NotificationAction {
  return {
    customId: LOCK_ALL_CUSTOM_ID,
    label: LOCK_ALL_LABEL,
    disabled,
  };
}

/**
 * Build the notification listing every unlocked device by display name.
 */
export function buildUnlockNotification(
  devices: ReadonlyArray<DeviceStatus>,
): NotificationPayload {
  return {
    title: "🔓 解錠されているスマートロックがあります",
    description: "下のボタンを押して、遠隔で施錠できます。",
    color: ALERT_COLOR,
    fields: devices.map((device) => ({
      name: "デバイス名",
      value: `**${device.name}**`,
    })),
    action: buildLockAllAction(false),
  };
}
