/**
 * Poller Module - Pure Transformations
 */
import type { DeviceStatus } from "../sesame/index.js";

/**
 * Devices reported unlocked. UNKNOWN devices are neither unlocked nor locked.
 */
export function selectUnlocked(
  statuses: ReadonlyArray<DeviceStatus>,
): DeviceStatus[] {
  return statuses.filter((status) => status.lockState === "unlocked");
}

/**
 * Count devices per lock state for log output.
 */
export function countByState(
  statuses: ReadonlyArray<DeviceStatus>,
): Readonly<{ locked: number; unlocked: number; unknown: number }> {
  return statuses.reduce(
    (counts, status) => ({
      ...counts,
      [status.lockState]: counts[status.lockState] + 1,
    }),
    { locked: 0, unlocked: 0, unknown: 0 },
  );
}
