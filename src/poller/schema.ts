/**
 * Poller Module - Schemas and Types
 *
 * State of the status-polling loop.
 */
import type { DeviceStatus } from "../sesame/index.js";

/**
 * Statuses seen by the most recent cycle.
 */
export type PollSnapshot = Readonly<{
  at: number;
  statuses: ReadonlyArray<DeviceStatus>;
}>;

/**
 * What a single cycle decided.
 */
export type PollOutcome =
  | "NO_UNLOCKED_DEVICES"
  | "NOTIFICATION_POSTED"
  | "NOTIFICATION_STILL_LIVE"
  | "CHANNEL_UNAVAILABLE"
  | "PROBE_FAILED"
  | "POST_FAILED";

export type PollLoopState = Readonly<{
  /** Whether start() has been called and stop() has not */
  isRunning: boolean;
  /** Whether a cycle is in flight */
  isPolling: boolean;
  lastPoll: PollSnapshot | null;
}>;

export const INITIAL_POLL_LOOP_STATE: PollLoopState = {
  isRunning: false,
  isPolling: false,
  lastPoll: null,
};
