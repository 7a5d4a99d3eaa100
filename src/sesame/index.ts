/**
 * Sesame Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type { DeviceStatus, LockState, SesameCommandPayload } from "./schema.js";
export type { SesameError } from "./errors.js";
export type { SesameClient, SesameClientOptions } from "./service.js";

// Error utilities
export { formatSesameError } from "./errors.js";

// Service functions (side effects)
export { createSesameClient } from "./service.js";

// Pure transformations
export {
  aesCmac,
  buildLockPayload,
  buildSignMessage,
  generateSign,
  parseLockState,
} from "./transform.js";
