/**
 * Error handling utilities for consistent error processing
 */

/**
 * Error object structure that may contain error information
 */
interface ErrorObject {
  message?: string;
  error?: string | unknown;
  detail?: string;
  code?: string;
  [key: string]: unknown;
}

/**
 * Serialized error structure
 */
export interface SerializedError {
  name?: string;
  message?: string;
  stack?: string;
  [key: string]: unknown;
}

/**
 * Extract error message from various error formats
 * @param error - The error object (can be string, object, or complex structure)
 * @param fallback - Fallback message if no error message found
 * @returns Clean error message
 */
export function extractErrorMessage(error: unknown, fallback: string = 'Unknown error occurred'): string {
  if (!error) {
    return fallback;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'object' && error !== null) {
    const errorObj = error as ErrorObject;

    const message = errorObj.message || errorObj.error || errorObj.detail;

    if (message) {
      return typeof message === 'string' ? message : JSON.stringify(message);
    }

    const errorDetails = Object.entries(errorObj)
      .filter(([, value]) => value !== undefined && value !== null)
      .map(([key, value]) => `${key}: ${String(value)}`)
      .join(', ');

    return errorDetails || fallback;
  }

  return String(error);
}

/**
 * Serialize error object to ensure it's properly JSON serializable
 * @param error - The error to serialize
 * @returns JSON-serializable error object
 */
export function serializeError(error: unknown): SerializedError | string | null {
  if (!error) {
    return null;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error instanceof Error) {
    const serialized: SerializedError = {
      name: error.name,
      message: error.message,
      stack: error.stack
    };

    // Own properties such as `code` or `errors` on our error classes
    const extra: Record<string, unknown> = { ...error };
    for (const [key, value] of Object.entries(extra)) {
      if (!(key in serialized) && typeof value !== 'function') {
        serialized[key] = value;
      }
    }

    return serialized;
  }

  if (typeof error === 'object') {
    const serialized: SerializedError = { message: extractErrorMessage(error) };
    for (const [key, value] of Object.entries(error)) {
      if (typeof value !== 'function') {
        serialized[key] = value;
      }
    }
    return serialized;
  }

  return String(error);
}

/**
 * Extract error details for logging
 * @param error - The error object (can be Error, string, or unknown)
 * @returns Object with error details for logging
 */
export function getErrorDetails(error: unknown): {
  message: string;
  stack?: string;
  name?: string;
} {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
      name: error.name
    };
  }

  return {
    message: typeof error === 'string' ? error : extractErrorMessage(error)
  };
}

/**
 * Format error for the metadata argument of logger calls
 * @param error - The error object (can be Error, string, or unknown)
 */
export function formatErrorForLogging(error: unknown): {
  error: string | { message: string; stack?: string; name?: string };
  stack?: string;
} {
  if (error instanceof Error) {
    return {
      error: getErrorDetails(error),
      stack: error.stack
    };
  }

  return {
    error: typeof error === 'string' ? error : extractErrorMessage(error)
  };
}
