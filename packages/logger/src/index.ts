/**
 * @fileoverview Public API exports for @tapline/logger
 * Structured logging and error handling for tapline
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Formats
export { redactPII, redactSensitiveFields, isSensitiveFieldName, REDACTED } from './formats.js';

// Global error handlers
export { attachGlobalHandlers, detachGlobalHandlers } from './errorHandler.js';

// Request context management
export {
  generateRequestId,
  getRequestContext,
  getRequestId,
  withRequestContext,
  withRequestContextSync,
  setRequestContext,
} from './request-context.js';

// Performance timing utilities
export { startTimer, measureSync } from './perf-timer.js';

// Host wrappers
export { withChatRequestContext, withCLIRequestContext } from './middleware.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
