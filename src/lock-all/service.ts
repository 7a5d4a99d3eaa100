/**
 * Lock-All Module - Service Layer
 *
 * Handles the "lock all" button: re-checks every device, locks the ones
 * still unlocked and reports back to the invoking user only.
 */
import type { DeviceConfig } from "../config.js";
import {
  createLogger,
  logOperationComplete,
  logOperationStart,
} from "../logger.js";
import type { NotificationManager } from "../notifications/index.js";
import { formatChatError } from "../notifications/index.js";
import type { SesameClient } from "../sesame/index.js";
import type { LockAllInteraction, LockAllReport } from "./schema.js";
import { formatLockAllReply, partitionLockResults } from "./transform.js";

const log = createLogger("lockAll");

export type LockAllDeps = Readonly<{
  devices: ReadonlyArray<DeviceConfig>;
  client: Pick<SesameClient, "getAllStatuses" | "sendLockCommand">;
  notifications: Pick<NotificationManager, "disableAction">;
}>;

export type LockAllHandler = Readonly<{
  handle: (interaction: LockAllInteraction) => Promise<LockAllReport>;
}>;

export function createLockAllHandler(deps: LockAllDeps): LockAllHandler {
  const { devices, client, notifications } = deps;

  async function handle(interaction: LockAllInteraction): Promise<LockAllReport> {
    const startTime = Date.now();

    // Acknowledge first, the interaction expires after a few seconds
    const deferResult = await interaction.deferReply();
    if (deferResult.isErr()) {
      log.error(
        { messageId: interaction.messageId },
        `Could not acknowledge lock-all interaction: ${formatChatError(deferResult.error)}`,
      );
    }

    logOperationStart(log, "lockAll", {
      user: interaction.userTag,
      messageId: interaction.messageId,
    });

    // State may have changed since the notification was posted
    const statuses = await client.getAllStatuses(devices);
    const unlockedIds = new Set(
      statuses
        .filter((status) => status.lockState === "unlocked")
        .map((status) => status.id),
    );
    const toLock = devices.filter((device) => unlockedIds.has(device.id));

    const outcomes = await Promise.all(
      toLock.map((device) => client.sendLockCommand(device)),
    );
    const report = partitionLockResults(toLock, outcomes);

    if (report.locked.length > 0) {
      log.info(
        { user: interaction.userTag, devices: report.locked },
        `${interaction.userTag} locked ${report.locked.join(", ")}`,
      );
    }

    const replyResult = await interaction.reply(formatLockAllReply(report));
    if (replyResult.isErr()) {
      log.error(
        { messageId: interaction.messageId },
        `Could not send lock-all reply: ${formatChatError(replyResult.error)}`,
      );
    }

    await notifications.disableAction(interaction.messageId);

    logOperationComplete(log, "lockAll", startTime, {
      locked: report.locked.length,
      failed: report.failed.length,
    });
    return report;
  }

  return { handle };
}
