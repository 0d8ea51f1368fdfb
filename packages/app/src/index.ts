/**
 * Main exports for @tapline/app package
 */

// Configuration exports
export { ConfigValidationError, configSchema, envMapping, getConfigSummary, loadConfig } from './config/index.js';
export type { Config } from './config/index.js';

// Command set
export * from './commands/index.js';

// Hosts
export { ConsoleShell, welcomeLine } from './services/console/console-shell.js';
export type { ConsoleShellOptions } from './services/console/console-shell.js';
export { DiscordBot } from './services/discord/discord-bot.js';
export type { DiscordBotConfig } from './services/discord/discord-bot.js';
export { createMessageHandler, MESSAGE_LIMIT, START_COMMAND, toCodeBlocks } from './services/discord/message-handler.js';
export type { MessageHandlerOptions } from './services/discord/message-handler.js';
export type { ChatMessage, ChatTransport, MessageOutcome } from './services/discord/types.js';

// Bootstrap
export { parseFlags, start, usage } from './start.js';
export type { Flags, StartOptions } from './start.js';
