/**
 * Sesame Module - Schemas and Types
 *
 * Defines the data shapes for the Sesame cloud API.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Lock State
// =============================================================================

/**
 * Lock state as seen by the poller. UNKNOWN covers API failures and
 * responses without a recognised state.
 */
export const LockStateSchema = z.enum(["locked", "unlocked", "unknown"]);

export type LockState = z.infer<typeof LockStateSchema>;

/**
 * Per-poll status of one configured device.
 */
export type DeviceStatus = Readonly<{
  id: string;
  name: string;
  lockState: LockState;
}>;

// =============================================================================
// Sesame Cloud API Types
// =============================================================================

/**
 * Response from GET {base}/{deviceId}.
 * Only the lock state is read; battery and position fields pass through.
 */
export const SesameStatusResponseSchema = z
  .object({
    CHSesame2Status: z.string(),
    batteryPercentage: z.number().optional(),
    batteryVoltage: z.number().optional(),
    position: z.number().optional(),
    wm2State: z.boolean().optional(),
    timestamp: z.number().optional(),
  })
  .passthrough();

export type SesameStatusResponse = z.infer<typeof SesameStatusResponseSchema>;

/**
 * Command codes accepted by POST {base}/{deviceId}/cmd.
 */
export const SESAME_COMMANDS = {
  toggle: 88,
  lock: 82,
  unlock: 83,
} as const;

/**
 * Command payload for POST {base}/{deviceId}/cmd.
 */
export const SesameCommandPayloadSchema = z.object({
  cmd: z.literal(SESAME_COMMANDS.lock),
  /** Base64 of the label shown in the lock's history */
  history: z.string(),
  /** AES-CMAC tag as lowercase hex */
  sign: z.string().regex(/^[0-9a-f]{32}$/),
});

export type SesameCommandPayload = z.infer<typeof SesameCommandPayloadSchema>;
