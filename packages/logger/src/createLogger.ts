/**
 * @fileoverview Main logger factory for tapline
 * Creates configured Winston logger instances with structured logging,
 * sensitive-field redaction and flexible transport options.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * - Structured logging with standard fields (timestamp, level, message, request_id)
 * - Redaction of sensitive fields (passwords, tokens, ...)
 * - Console and file transports
 * - JSON in production, pretty-print otherwise
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Shell started', { prompt: '> ' });
 * ```
 *
 * @example
 * ```typescript
 * // Quiet logger for tests and embedded engines
 * const logger = createLogger({ level: 'error', silent: true });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stream,
    silent = false,
  } = config;

  // Order is important: redact first, then standard fields, then output format
  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        // Keep stdout free for command output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: logFormat,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(new winston.transports.Stream({ stream, level, format: logFormat }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    silent,
    // Exits are handled explicitly in errorHandler.ts
    exitOnError: false,
  });
}

/**
 * Creates a child logger that adds the given context fields to every entry.
 *
 * @example
 * ```typescript
 * const shellLogger = createChildLogger(logger, { component: 'console-shell' });
 * shellLogger.info('Input closed'); // includes component=console-shell
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
