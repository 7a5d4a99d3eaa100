/**
 * Poller Module - Service Layer
 *
 * Fixed-interval loop: fetch every device status, then post at most one
 * "devices unlocked" notification while the previous one is still live.
 */
import type { DeviceConfig } from "../config.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { NotificationManager } from "../notifications/index.js";
import { formatChatError } from "../notifications/index.js";
import type { SesameClient } from "../sesame/index.js";
import type { PollLoopState, PollOutcome, PollSnapshot } from "./schema.js";
import { INITIAL_POLL_LOOP_STATE } from "./schema.js";
import { countByState, selectUnlocked } from "./transform.js";

const log = createLogger("poller");

export type PollLoopDeps = Readonly<{
  devices: ReadonlyArray<DeviceConfig>;
  client: Pick<SesameClient, "getAllStatuses">;
  notifications: NotificationManager;
  intervalMs: number;
  /** Resolves once the chat session is connected */
  waitUntilReady: () => Promise<void>;
  now?: () => number;
}>;

export type PollLoop = Readonly<{
  runCycle: () => Promise<PollOutcome>;
  start: () => Promise<void>;
  stop: () => void;
  getState: () => PollLoopState;
}>;

export function createPollLoop(deps: PollLoopDeps): PollLoop {
  const { devices, client, notifications, intervalMs, waitUntilReady } = deps;
  const now = deps.now ?? Date.now;

  let state: PollLoopState = INITIAL_POLL_LOOP_STATE;
  let stopRequested = false;
  let sleepTimer: NodeJS.Timeout | null = null;
  let wakeUp: (() => void) | null = null;

  function getState(): PollLoopState {
    return state;
  }

  /**
   * Single poll cycle.
   */
  async function runCycle(): Promise<PollOutcome> {
    // 1. Fetch all statuses concurrently
    const statuses = await client.getAllStatuses(devices);
    const snapshot: PollSnapshot = { at: now(), statuses };
    state = { ...state, lastPoll: snapshot };

    // 2. Unlocked devices (UNKNOWN is ignored)
    const unlocked = selectUnlocked(statuses);
    log.debug(countByState(statuses), "Device statuses fetched");

    // 3. Skip the cycle when the channel is unreachable
    const channelResult = await notifications.checkChannel();
    if (channelResult.isErr()) {
      log.warn(
        { errorType: channelResult.error.type },
        `Notification channel unavailable, skipping cycle: ${formatChatError(channelResult.error)}`,
      );
      return "CHANNEL_UNAVAILABLE";
    }

    // 4. Only one live notification at a time
    const reuseResult = await notifications.tryReuse();
    if (reuseResult.isErr()) {
      log.error(
        { errorType: reuseResult.error.type },
        `Could not check previous notification: ${formatChatError(reuseResult.error)}`,
      );
      return "PROBE_FAILED";
    }
    if (reuseResult.value) {
      log.info("Previous unlock notification is still live, not posting another");
      return "NOTIFICATION_STILL_LIVE";
    }

    if (unlocked.length === 0) {
      return "NO_UNLOCKED_DEVICES";
    }

    // 5. Post a fresh notification
    log.info(
      { devices: unlocked.map((device) => device.name) },
      "Unlocked devices detected",
    );
    const postResult = await notifications.post(unlocked);
    return postResult.isOk() ? "NOTIFICATION_POSTED" : "POST_FAILED";
  }

  function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      wakeUp = resolve;
      sleepTimer = setTimeout(() => {
        sleepTimer = null;
        wakeUp = null;
        resolve();
      }, ms);
    });
  }

  /**
   * Start the loop. Waits for the chat session before the first tick.
   */
  async function start(): Promise<void> {
    if (state.isRunning) {
      log.warn("Poll loop already running");
      return;
    }

    state = { ...state, isRunning: true };
    stopRequested = false;

    log.info("Waiting for chat session before polling...");
    await waitUntilReady();
    log.info({ intervalMs, devices: devices.length }, "Starting poll loop");

    while (!stopRequested) {
      const startTime = Date.now();
      state = { ...state, isPolling: true };
      logOperationStart(log, "pollCycle");

      try {
        const outcome = await runCycle();
        logOperationComplete(log, "pollCycle", startTime, { outcome });
      } catch (error) {
        logOperationFailed(log, "pollCycle", error);
      } finally {
        state = { ...state, isPolling: false };
      }

      if (stopRequested) break;
      await sleep(intervalMs);
    }

    log.info("Poll loop stopped");
    state = { ...state, isRunning: false };
  }

  /**
   * Stop the loop after the current cycle. Cancels a pending sleep.
   */
  function stop(): void {
    if (!state.isRunning) {
      log.warn("Poll loop not running");
      return;
    }

    log.info("Stopping poll loop...");
    stopRequested = true;

    if (sleepTimer) {
      clearTimeout(sleepTimer);
      sleepTimer = null;
    }
    if (wakeUp) {
      const resolve = wakeUp;
      wakeUp = null;
      resolve();
    }
  }

  return { runCycle, start, stop, getState };
}
