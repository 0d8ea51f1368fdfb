/**
 * @fileoverview Request context management using AsyncLocalStorage
 * Provides request ID generation and propagation; one request is one line of user input.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Request context structure
 */
export interface RequestContext {
  /** Unique request identifier (UUID v4) */
  request_id: string;

  [key: string]: unknown;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Generate a new unique request ID (UUID v4 format)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Get the current request context, or undefined outside of one
 */
export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

/**
 * Get the current request ID from the active context
 *
 * @example
 * ```typescript
 * logger.info('Reply sent', { request_id: getRequestId() });
 * ```
 */
export function getRequestId(): string | undefined {
  return requestContextStorage.getStore()?.request_id;
}

function buildContext(requestId?: string, additionalContext?: Record<string, unknown>): RequestContext {
  return {
    ...additionalContext,
    request_id: requestId || generateRequestId(),
  };
}

/**
 * Execute a function within a new request context.
 * The request ID is propagated through all async operations started by `fn`.
 *
 * @param requestId - Request ID to use (a new one is generated when omitted)
 * @param additionalContext - Extra fields stored alongside the request ID
 *
 * @example
 * ```typescript
 * await withRequestContext(async () => {
 *   await message.reply(processor.processLine(message.content));
 * }, undefined, { transport: 'discord' });
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  return requestContextStorage.run(buildContext(requestId, additionalContext), fn);
}

/**
 * Synchronous variant of {@link withRequestContext}
 *
 * @example
 * ```typescript
 * const reply = withRequestContextSync(() => processor.processLine(line));
 * ```
 */
export function withRequestContextSync<T>(
  fn: () => T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): T {
  return requestContextStorage.run(buildContext(requestId, additionalContext), fn);
}

/**
 * Merge fields into the current request context
 *
 * @returns true if context was updated, false if not in a request context
 */
export function setRequestContext(fields: Record<string, unknown>): boolean {
  const context = requestContextStorage.getStore();
  if (!context) {
    return false;
  }

  Object.assign(context, fields);
  return true;
}
