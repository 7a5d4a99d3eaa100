/**
 * Module-scoped color-coded loggers for the lock watch service.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs.
 */
import { pino, type Logger as PinoLogger } from "pino";
import { loggingConfig } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Core modules
  app: "\x1b[34m", // blue
  poller: "\x1b[33m", // yellow

  // Device control
  sesame: "\x1b[36m", // cyan
  lockAll: "\x1b[32m", // green

  // Communication modules
  discord: "\x1b[94m", // bright blue
  notifications: "\x1b[95m", // bright magenta

  // Infrastructure
  api: "\x1b[35m", // magenta
  middleware: "\x1b[90m", // gray
} as const;

const RESET = "\x1b[0m";

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

export type Logger = PinoLogger;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @example
 * const log = createLogger('sesame');
 * log.info({ deviceId }, 'Sending lock command');
 */
export function createLogger(module: ModuleName): Logger {
  const color = MODULE_COLORS[module];

  if (loggingConfig.NODE_ENV === "development") {
    return pino({
      name: module,
      level: loggingConfig.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: `${color}[{name}]${RESET} {msg}`,
          ignore: "pid,hostname",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  // Structured JSON for production
  return pino({
    name: module,
    level: loggingConfig.LOG_LEVEL,
  });
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.info({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with duration.
 */
export function logOperationComplete(
  logger: Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

/**
 * Log operation failure with error details.
 */
export function logOperationFailed(
  logger: Logger,
  operation: string,
  error: unknown,
  context: Record<string, unknown> = {},
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(
    { operation, error: errorMessage, ...context },
    `✗ ${operation} failed: ${errorMessage}`,
  );
}
