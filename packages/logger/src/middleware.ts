/**
 * @fileoverview Request context wrappers for the hosts that feed lines into a processor
 */

import { withRequestContext, generateRequestId } from './request-context.js';

/**
 * Wraps a chat message handler so each incoming message runs under its own request ID.
 *
 * @param transport - Transport name recorded in the context (e.g. 'discord')
 *
 * @example
 * ```typescript
 * const onMessage = withChatRequestContext('discord', async (message: Message) => {
 *   logger.info('Message received'); // carries request_id
 *   await message.reply(processor.processLine(message.content));
 * });
 * client.on(Events.MessageCreate, onMessage);
 * ```
 */
export function withChatRequestContext<TMessage, TResult>(
  transport: string,
  handler: (message: TMessage) => Promise<TResult>
): (message: TMessage) => Promise<TResult> {
  return async (message: TMessage): Promise<TResult> => {
    return withRequestContext(() => handler(message), generateRequestId(), {
      context: 'chat',
      transport,
    });
  };
}

/**
 * Create a request context for one CLI operation
 *
 * @param operation - Operation name (e.g. 'shell:line')
 * @param args - Optional fields for the context
 * @returns Function to execute code with request context
 *
 * @example
 * ```typescript
 * const reply = await withCLIRequestContext('shell:line')(async () => processor.processLine(line));
 * ```
 */
export function withCLIRequestContext(operation: string, args?: Record<string, unknown>) {
  return async <T>(fn: () => Promise<T>): Promise<T> => {
    return withRequestContext(() => fn(), generateRequestId(), {
      context: 'cli',
      operation,
      ...args,
    });
  };
}
