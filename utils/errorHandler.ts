/**
 * Error handling utilities for consistent error processing
 */

// Fields that may carry a message on plain error objects, in priority order
const MESSAGE_FIELDS = ['message', 'error', 'detail', 'statusMessage'] as const;

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
 * @param fallback - Fallback message if no error message found
 */
export function extractErrorMessage(error: unknown, fallback: string = 'Unknown error occurred'): string {
  if (!error) {
    return fallback;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error instanceof Error) {
    return error.message || fallback;
  }

  if (typeof error === 'object') {
    const fields = new Map<string, unknown>(Object.entries(error));
    const message = MESSAGE_FIELDS.map(field => fields.get(field)).find(Boolean);

    if (message) {
      return typeof message === 'string' ? message : JSON.stringify(message);
    }

    return JSON.stringify(error);
  }

  return String(error);
}

/**
 * Serialize error object so it can travel as log metadata
 */
export function serializeError(error: unknown): SerializedError | string | null {
  if (!error) {
    return null;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return extractErrorMessage(error);
}

/**
 * Render an HTTP response body for a log line.
 * GitHub answers with JSON objects; anything else is shown as text.
 */
export function describeResponseBody(body: unknown): string {
  if (body === undefined || body === null) {
    return '';
  }
  if (typeof body === 'string') {
    return body;
  }
  if (Buffer.isBuffer(body)) {
    return body.toString('utf8');
  }
  try {
    return JSON.stringify(body);
  } catch {
    return String(body);
  }
}
