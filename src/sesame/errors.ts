/**
 * Sesame Module - Error Types
 *
 * Typed error unions for Sesame cloud API operations.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while talking to a Sesame device.
 */
export type SesameError =
  | {
      readonly type: "NETWORK_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "API_ERROR";
      readonly message: string;
      readonly statusCode: number;
      readonly body: string;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly message: string;
      readonly responseData?: unknown;
    }
  | {
      readonly type: "INVALID_KEY";
      readonly message: string;
    };

/**
 * Create a NETWORK_ERROR.
 */
export function networkError(message: string, cause?: Error): SesameError {
  if (cause) {
    return { type: "NETWORK_ERROR", message, cause };
  }
  return { type: "NETWORK_ERROR", message };
}

/**
 * Create an API_ERROR from a non-200 response.
 */
export function apiError(statusCode: number, body: string): SesameError {
  return {
    type: "API_ERROR",
    message: `HTTP ${statusCode}`,
    statusCode,
    body,
  };
}

/**
 * Create an INVALID_RESPONSE error.
 */
export function invalidResponse(
  message: string,
  responseData?: unknown,
): SesameError {
  return { type: "INVALID_RESPONSE", message, responseData };
}

/**
 * Create an INVALID_KEY error.
 */
export function invalidKey(message: string): SesameError {
  return { type: "INVALID_KEY", message };
}

/**
 * Format a SesameError for logging.
 */
export function formatSesameError(error: SesameError): string {
  switch (error.type) {
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "API_ERROR":
      return `API error ${error.statusCode}: ${error.body}`;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
    case "INVALID_KEY":
      return `Invalid key: ${error.message}`;
  }
}
