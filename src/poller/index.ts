/**
 * Poller Module - Public API
 */

// Types
export type { PollLoopState, PollOutcome, PollSnapshot } from "./schema.js";
export type { PollLoop, PollLoopDeps } from "./service.js";

export { INITIAL_POLL_LOOP_STATE } from "./schema.js";

// Service functions
export { createPollLoop } from "./service.js";

// Pure transformations
export { countByState, selectUnlocked } from "./transform.js";
