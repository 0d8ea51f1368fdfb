/**
 * Discord transport using discord.js
 */

import { Client, Events, GatewayIntentBits, Partials, type Message } from 'discord.js';
import type { CommandProcessor } from '@tapline/core';
import { createChildLogger, withChatRequestContext, type Logger } from '@tapline/logger';
import { createMessageHandler } from './message-handler.js';
import type { ChatTransport, MessageOutcome } from './types.js';

const READY_TIMEOUT_MS = 30000;

export interface DiscordBotConfig {
  processor: CommandProcessor;
  name: string;
  token: string;
  channelId?: string;
  logger: Logger;
}

/**
 * Answers every text message (optionally limited to one channel) with the
 * processor's reply
 */
export class DiscordBot implements ChatTransport {
  private readonly logger: Logger;
  private readonly client: Client;
  private readonly token: string;
  private readonly onMessage: (message: Message) => Promise<MessageOutcome>;
  private ready = false;

  constructor(config: DiscordBotConfig) {
    this.token = config.token;
    this.logger = createChildLogger(config.logger, { component: 'discord-bot' });

    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.DirectMessages,
        GatewayIntentBits.MessageContent,
      ],
      // Direct message channels are not cached before their first message
      partials: [Partials.Channel],
    });

    this.onMessage = withChatRequestContext(
      'discord',
      createMessageHandler({
        processor: config.processor,
        name: config.name,
        channelId: config.channelId,
        logger: config.logger,
      })
    );

    this.setupEventHandlers();
  }

  /**
   * Log in and wait until the gateway reports ready
   */
  async start(): Promise<void> {
    this.logger.info('Discord bot connecting');

    try {
      await this.client.login(this.token);
      await this.waitForReady(READY_TIMEOUT_MS);
      this.logger.info('Discord bot connected successfully');
    } catch (error) {
      this.logger.error('Failed to start Discord bot', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  async stop(): Promise<void> {
    this.logger.info('Discord bot shutting down');
    this.ready = false;
    await this.client.destroy();
    this.logger.info('Discord bot disconnected successfully');
  }

  private setupEventHandlers(): void {
    this.client.on(Events.ClientReady, () => {
      this.ready = true;
      this.logger.info('Discord bot ready', {
        username: this.client.user?.tag,
        guilds: this.client.guilds.cache.size,
      });
    });

    this.client.on(Events.MessageCreate, (message) => {
      this.onMessage(message).catch((error: unknown) => {
        this.logger.error('Error handling message', {
          channel: message.channelId,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    });

    this.client.on(Events.Error, (error) => {
      this.logger.error('Discord client error', {
        error: error.message,
        stack: error.stack,
      });
    });

    this.client.on(Events.Warn, (info) => {
      this.logger.warn('Discord client warning', { info });
    });

    this.client.on(Events.ShardDisconnect, () => {
      this.ready = false;
      this.logger.warn('Discord client disconnected');
    });

    this.client.on(Events.ShardReconnecting, () => {
      this.logger.info('Discord client reconnecting');
    });

    this.client.on(Events.ShardResume, () => {
      this.ready = true;
      this.logger.info('Discord client resumed');
    });
  }

  private async waitForReady(timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.ready) {
        resolve();
        return;
      }

      const timeout = setTimeout(() => {
        reject(new Error('Discord bot ready timeout'));
      }, timeoutMs);

      this.client.once(Events.ClientReady, () => {
        clearTimeout(timeout);
        resolve();
      });
    });
  }
}
