/**
 * @fileoverview Custom Winston formats for the tapline logger
 * Includes sensitive-field redaction, standard fields, output formatting and request ID injection.
 */

import { format } from 'winston';
import { getRequestId } from './request-context.js';

/**
 * Sensitive field patterns that should be redacted from logs.
 * Matches are case-insensitive to catch common variations
 * (password, apiKey, API_KEY, Authorization, ...).
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /pwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /^auth$/i,
  /private[_-]?key/i,
  /credit[_-]?card/i,
];

/**
 * Replacement value for redacted sensitive data.
 */
export const REDACTED = '[REDACTED]';

/**
 * Fields winston itself owns; never redacted.
 */
const CORE_FIELDS = ['level', 'message', 'timestamp', 'label', 'stack'];

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively redacts sensitive fields, returning a copy.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ username: 'alice', password: 'test-secret' });
 * // { username: 'alice', password: '[REDACTED]' }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  if (!isPlainRecord(value)) {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    copy[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(field);
  }
  return copy;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Must come first in the format chain.
 *
 * @example
 * ```typescript
 * logger.info('Bot login', { user: 'tapline', token: 'test-token' });
 * // {"level":"info","message":"Bot login","user":"tapline","token":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(redacted[key]);
  }

  return redacted;
});

/**
 * Winston format that adds the timestamp, error stacks and the active request_id.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),

  format.errors({ stack: true }),

  format((info) => {
    const requestId = getRequestId();
    if (requestId && !info['request_id']) {
      info['request_id'] = requestId;
    }
    return info;
  })()
);

/**
 * Winston format for human-readable output.
 *
 * @example
 * ```typescript
 * // [2026-01-05T12:34:56.789Z] debug: Line dispatched component=processor request_id=... result="executed"
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, command, request_id, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (command) context.push(`command=${String(command)}`);
    if (request_id) context.push(`request_id=${String(request_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (['level', 'message', 'timestamp', 'stack', 'splat'].includes(key)) {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    if (info['stack']) {
      return `${baseMsg}\n${String(info['stack'])}`;
    }

    return baseMsg;
  })
);
