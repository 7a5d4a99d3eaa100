/**
 * Sesame Lock Watch - Application Entry Point
 *
 * Sets up:
 * - Sesame cloud API client
 * - Discord bot session and the "lock all" button handler
 * - Status poll loop (starts once the bot is ready)
 * - Hono health API
 * - Graceful shutdown
 */
import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { loadConfig } from "./config.js";
import { createDiscordGateway } from "./discord/index.js";
import { createLockAllHandler } from "./lock-all/index.js";
import { createLogger } from "./logger.js";
import { createNotificationManager } from "./notifications/index.js";
import { createPollLoop } from "./poller/index.js";
import { createSesameClient } from "./sesame/index.js";

// Exits before any network activity if the environment is incomplete
const config = loadConfig();

const log = createLogger("app");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  SESAME LOCK WATCH");
console.log("========================================");
console.log("");

// Non-sensitive values only
log.info(
  {
    env: config.nodeEnv,
    port: config.port,
    sesameBaseUrl: config.sesame.baseUrl,
    devices: config.devices.map((device) => device.name),
    channelId: config.discord.channelId,
    checkIntervalSeconds: config.checkIntervalSeconds,
  },
  "Configuration loaded",
);

// =============================================================================
// WIRING
// =============================================================================

const sesame = createSesameClient({
  apiKey: config.sesame.apiKey,
  baseUrl: config.sesame.baseUrl,
  historyLabel: config.sesame.historyLabel,
});

const gateway = createDiscordGateway(config.discord.channelId);
const notifications = createNotificationManager(gateway.channel);

const poller = createPollLoop({
  devices: config.devices,
  client: sesame,
  notifications,
  intervalMs: config.checkIntervalSeconds * 1000,
  waitUntilReady: gateway.waitUntilReady,
});

const lockAll = createLockAllHandler({
  devices: config.devices,
  client: sesame,
  notifications,
});

gateway.onLockAll(lockAll.handle);

// =============================================================================
// HEALTH API
// =============================================================================

const app = createApp({
  devices: config.devices,
  intervalSeconds: config.checkIntervalSeconds,
  getPollState: poller.getState,
  getPendingNotification: notifications.getPending,
});

const server = serve(
  { fetch: app.fetch, port: config.port, hostname: "0.0.0.0" },
  (info) => {
    log.info({ port: info.port }, `🚀 Health API listening on port ${info.port}`);
  },
);

// =============================================================================
// START
// =============================================================================

poller.start().catch((error: unknown) => {
  log.error({ error }, "Poll loop crashed");
});

gateway.login(config.discord.token).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  log.fatal({ error: message }, "Discord login failed, check DISCORD_BOT_TOKEN");
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = async (signal: string): Promise<void> => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  poller.stop();
  server.close();
  await gateway.destroy();

  log.info("Shutdown complete");
  process.exit(0);
};

const onSignal = (signal: string) => {
  shutdown(signal).catch((error: unknown) => {
    log.error({ error }, "Shutdown failed");
    process.exit(1);
  });
};

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
