/**
 * Lock-All Module - Pure Transformations
 *
 * Builds the ephemeral reply sent to the user who pressed "lock all".
 */
import type { LockAllReport } from "./schema.js";

export const ALREADY_LOCKED_MESSAGE =
  "✅ すべてのデバイスは既に施錠されていました。";

/**
 * Split devices by the outcome of their lock command.
 * `outcomes[i]` belongs to `devices[i]`.
 */
export function partitionLockResults(
  devices: ReadonlyArray<Readonly<{ name: string }>>,
  outcomes: ReadonlyArray<boolean>,
): LockAllReport {
  const locked: string[] = [];
  const failed: string[] = [];

  devices.forEach((device, index) => {
    if (outcomes[index] === true) {
      locked.push(device.name);
    } else {
      failed.push(device.name);
    }
  });

  return { locked, failed };
}

/**
 * Format the reply. Both lines appear when some locks succeeded and some failed.
 */
export function formatLockAllReply(report: LockAllReport): string {
  if (report.locked.length === 0 && report.failed.length === 0) {
    return ALREADY_LOCKED_MESSAGE;
  }

  const lines: string[] = [];
  if (report.locked.length > 0) {
    lines.push(`✅ **${report.locked.join(", ")}** を施錠しました。`);
  }
  if (report.failed.length > 0) {
    lines.push(`❌ **${report.failed.join(", ")}** の施錠に失敗しました。`);
  }
  return lines.join("\n");
}
