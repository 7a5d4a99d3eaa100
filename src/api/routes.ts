/**
 * Read-only HTTP surface for the lock watch service.
 *
 * - /api/health - Liveness plus configuration summary
 * - /api/status - Statuses seen by the last poll cycle
 */
import { Hono } from "hono";
import type { DeviceConfig } from "../config.js";
import { createLogger } from "../logger.js";
import type { PendingNotification } from "../notifications/index.js";
import type { PollLoopState } from "../poller/index.js";

const log = createLogger("api");

export type RoutesDeps = Readonly<{
  devices: ReadonlyArray<DeviceConfig>;
  intervalSeconds: number;
  getPollState: () => PollLoopState;
  getPendingNotification: () => PendingNotification | null;
}>;

export const APP_VERSION = "1.0.0";

export function createRoutes(deps: RoutesDeps): Hono {
  const routes = new Hono();

  /**
   * Health endpoint - used by container orchestration and monitoring.
   * Never exposes secrets or the API key.
   */
  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    const pollState = deps.getPollState();
    const pending = deps.getPendingNotification();

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: APP_VERSION,
      config: {
        devices: deps.devices.map((device) => ({
          id: device.id,
          name: device.name,
        })),
        intervalSeconds: deps.intervalSeconds,
      },
      poller: {
        isRunning: pollState.isRunning,
        lastPollAt: pollState.lastPoll
          ? new Date(pollState.lastPoll.at).toISOString()
          : null,
      },
      pendingNotification: pending
        ? {
            messageId: pending.messageId,
            postedAt: new Date(pending.postedAt).toISOString(),
            devices: pending.devices.map((device) => device.name),
          }
        : null,
    });
  });

  /**
   * Last poll snapshot.
   */
  routes.get("/api/status", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "GET /api/status");

    const lastPoll = deps.getPollState().lastPoll;

    if (!lastPoll) {
      return c.json({ lastPoll: null, requestId });
    }

    return c.json({
      lastPoll: {
        at: new Date(lastPoll.at).toISOString(),
        devices: lastPoll.statuses.map((status) => ({
          id: status.id,
          name: status.name,
          lockState: status.lockState,
        })),
      },
      requestId,
    });
  });

  /**
   * Version endpoint - returns app version.
   */
  routes.get("/api/version", (c) => c.json({ version: APP_VERSION }));

  return routes;
}
