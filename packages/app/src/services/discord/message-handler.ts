/**
 * Turns chat messages into processor lines and answers with code blocks
 */

import type { CommandProcessor } from '@tapline/core';
import { createChildLogger, startTimer, type Logger } from '@tapline/logger';
import { welcomeLine } from '../console/console-shell.js';
import type { ChatMessage, MessageOutcome } from './types.js';

/** Discord rejects longer messages */
export const MESSAGE_LIMIT = 2000;

export const START_COMMAND = '/start';

const FENCE = '```';
const ZERO_WIDTH_SPACE = '\u200b';

export interface MessageHandlerOptions {
  processor: CommandProcessor;
  /** Shown in reply to the start command */
  name: string;
  /** Only messages from this channel are answered when set */
  channelId?: string;
  logger: Logger;
}

function escapeFences(text: string): string {
  return text.split(FENCE).join(`\`${ZERO_WIDTH_SPACE}\`${ZERO_WIDTH_SPACE}\``);
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Cut `line` into pieces of at most `room` UTF-16 units. A cut never lands
 * inside a surrogate pair unless `room` is 1.
 */
function cutLine(line: string, room: number): string[] {
  const pieces: string[] = [];
  let start = 0;
  do {
    let end = Math.min(start + room, line.length);
    if (end < line.length && end - start > 1 && isHighSurrogate(line.charCodeAt(end - 1))) {
      end -= 1;
    }
    pieces.push(line.slice(start, end));
    start = end;
  } while (start < line.length);
  return pieces;
}

/**
 * Split `text` into code blocks of at most `limit` characters each, breaking
 * at line ends where possible.
 */
export function toCodeBlocks(text: string, limit = MESSAGE_LIMIT): string[] {
  const overhead = `${FENCE}\n\n${FENCE}`.length;
  const room = limit - overhead;
  if (room < 1) {
    throw new RangeError(`Message limit ${limit} leaves no room for text`);
  }

  const pieces: string[] = [];
  for (const line of escapeFences(text).split('\n')) {
    pieces.push(...cutLine(line, room));
  }

  const chunks: string[] = [];
  let current: string | undefined;
  for (const piece of pieces) {
    if (current === undefined) {
      current = piece;
    } else if (current.length + 1 + piece.length <= room) {
      current += `\n${piece}`;
    } else {
      chunks.push(current);
      current = piece;
    }
  }
  if (current !== undefined) {
    chunks.push(current);
  }

  return chunks.map((chunk) => `${FENCE}\n${chunk}\n${FENCE}`);
}

/**
 * @example
 * ```typescript
 * const handle = createMessageHandler({ processor, name: 'Tapline bot', logger });
 * client.on(Events.MessageCreate, (message) => {
 *   handle(message).catch((error) => logger.error('Reply failed', { error }));
 * });
 * ```
 */
export function createMessageHandler(options: MessageHandlerOptions): (message: ChatMessage) => Promise<MessageOutcome> {
  const { processor, name, channelId } = options;
  const logger = createChildLogger(options.logger, { component: 'discord-handler', transport: 'discord' });

  return async (message: ChatMessage): Promise<MessageOutcome> => {
    if (message.author.bot) {
      return { kind: 'ignored', reason: 'bot' };
    }
    if (channelId !== undefined && message.channelId !== channelId) {
      return { kind: 'ignored', reason: 'channel' };
    }

    const request = message.content.trim();
    if (request.length === 0) {
      return { kind: 'ignored', reason: 'empty' };
    }

    const timer = startTimer();
    const response = request === START_COMMAND ? welcomeLine(name) : processor.processLine(message.content);
    const blocks = toCodeBlocks(response);

    for (const block of blocks) {
      await message.reply(block);
    }

    logger.info('Message answered', {
      author: message.author.tag,
      channel: message.channelId,
      chunks: blocks.length,
      duration_ms: timer.stop(),
    });
    return { kind: 'answered', chunks: blocks.length };
  };
}
