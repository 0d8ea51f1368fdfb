/**
 * Error sanitization utilities for safe logging
 */

export interface SanitizedError {
  name: string;
  message: string;
  stack?: string;
}

/**
 * Reduces a thrown value to name and message before it is logged.
 * The stack is kept in development or when explicitly requested.
 */
export function sanitizeError(error: unknown, includeStack = false): SanitizedError {
  const isDevelopment = process.env['NODE_ENV'] === 'development';

  if (error instanceof Error) {
    const sanitized: SanitizedError = {
      name: error.name,
      message: error.message,
    };

    if ((isDevelopment || includeStack) && error.stack) {
      sanitized.stack = error.stack;
    }

    return sanitized;
  }

  return {
    name: 'Unknown',
    message: String(error),
  };
}
