/**
 * Notifications Module - Error Types
 *
 * Typed error union for chat channel failures.
 * Errors are values, not exceptions.
 */

/**
 * Union type of all possible chat channel errors.
 */
export type ChatError =
  | { type: "NOT_FOUND"; resource: "message" | "channel"; message: string }
  | { type: "PERMISSION_DENIED"; message: string }
  | { type: "CHANNEL_UNAVAILABLE"; message: string }
  | { type: "SEND_FAILED"; message: string; cause?: Error };

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Create a NOT_FOUND error.
 */
export function notFound(
  resource: "message" | "channel",
  message: string,
): ChatError {
  return { type: "NOT_FOUND", resource, message };
}

/**
 * Create a PERMISSION_DENIED error.
 */
export function permissionDenied(message: string): ChatError {
  return { type: "PERMISSION_DENIED", message };
}

/**
 * Create a CHANNEL_UNAVAILABLE error.
 */
export function channelUnavailable(message: string): ChatError {
  return { type: "CHANNEL_UNAVAILABLE", message };
}

/**
 * Create a SEND_FAILED error.
 */
export function sendFailed(message: string, cause?: Error): ChatError {
  return cause !== undefined
    ? { type: "SEND_FAILED", message, cause }
    : { type: "SEND_FAILED", message };
}

/**
 * Format a ChatError for logging.
 */
export function formatChatError(error: ChatError): string {
  switch (error.type) {
    case "NOT_FOUND":
      return `${error.resource} not found: ${error.message}`;
    case "PERMISSION_DENIED":
      return `Permission denied: ${error.message}`;
    case "CHANNEL_UNAVAILABLE":
      return `Channel unavailable: ${error.message}`;
    case "SEND_FAILED":
      return `Send failed: ${error.message}`;
  }
}
