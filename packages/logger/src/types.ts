/**
 * @fileoverview Type definitions for the tapline logger
 * Provides strongly-typed interfaces for logger configuration and usage.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Faults that need attention (configuration mistakes, crashed callbacks)
 * - 'warn': Conditions that should be reviewed
 * - 'info': Registration and lifecycle events
 * - 'debug': One entry per dispatched line
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/tapline.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * Messages below this level will be filtered out.
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * - true: Machine-readable JSON lines
   * - false: Human-readable pretty-print
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for file transport.
   * If provided, logs will be written to this file in addition to console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Extra destination stream (e.g. an in-memory stream in tests).
   * Receives the same formatted lines as the console.
   */
  stream?: NodeJS.WritableStream;

  /**
   * Drop every entry before it reaches a transport.
   * @default false
   */
  silent?: boolean;
}

/**
 * Child logger context fields.
 * These fields will be automatically included in all logs from the child logger.
 */
export interface ChildLoggerContext {
  component?: string;
  request_id?: string;
  transport?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;
