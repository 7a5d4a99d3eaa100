/**
 * Global error boundary - catches all unhandled route errors.
 */
import type { ErrorHandler } from "hono";
import { loggingConfig } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

/**
 * Logs errors with context and returns a clean JSON response.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "❌ Unhandled error",
  );

  // Don't expose internal errors in production
  const message =
    loggingConfig.NODE_ENV === "production"
      ? "Internal server error"
      : err.message;

  return c.json({ error: message, requestId }, 500);
};
