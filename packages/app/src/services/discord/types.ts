/**
 * Discord transport types
 */

/**
 * The part of a discord.js `Message` the handler reads
 */
export interface ChatMessage {
  readonly content: string;
  readonly channelId: string;
  readonly author: {
    readonly bot: boolean;
    readonly tag: string;
  };
  reply(content: string): Promise<unknown>;
}

/**
 * What happened to one incoming message
 */
export type MessageOutcome =
  | { readonly kind: 'ignored'; readonly reason: 'bot' | 'channel' | 'empty' }
  | { readonly kind: 'answered'; readonly chunks: number };

/**
 * Connection lifecycle of a chat transport
 */
export interface ChatTransport {
  start(): Promise<void>;
  stop(): Promise<void>;
}
