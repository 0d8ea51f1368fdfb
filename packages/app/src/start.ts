/**
 * Application bootstrap
 *
 * config → logger → global handlers → command set → host. The host is the
 * Discord bot when enabled, the console shell otherwise. Words after the
 * flags are run as one line and the process ends.
 */

import {
  attachGlobalHandlers,
  createLogger,
  startTimer,
  withCLIRequestContext,
  withRequestContext,
  type Logger,
} from '@tapline/logger';
import { isConfigurationError, type CommandProcessor } from '@tapline/core';
import { createCommandSet } from './commands/index.js';
import { ConfigValidationError, getConfigSummary, loadConfig, type Config } from './config/index.js';
import { ConsoleShell } from './services/console/console-shell.js';
import { DiscordBot } from './services/discord/discord-bot.js';

export interface StartOptions {
  /** Arguments after the executable; `process.argv.slice(2)` by default */
  argv?: readonly string[];
  env?: NodeJS.ProcessEnv;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Error stream for usage and configuration problems */
  errorOutput?: NodeJS.WritableStream;
}

export interface Flags {
  help: boolean;
  version: boolean;
  verbose: boolean;
  /** Words that are not flags, joined into one line */
  line: string;
}

const FLAGS = new Set(['--help', '-h', '--version', '--verbose', '-v']);

export function parseFlags(argv: readonly string[]): Flags {
  return {
    help: argv.includes('--help') || argv.includes('-h'),
    version: argv.includes('--version'),
    verbose: argv.includes('--verbose') || argv.includes('-v'),
    line: argv.filter((arg) => !FLAGS.has(arg)).join(' '),
  };
}

export function usage(): string {
  return `
tapline - tree-structured command console

Usage: tapline [options] [command line]

With no command line an interactive shell starts (or the Discord bot, when
DISCORD_ENABLED is true). With one, the line is processed once.

Options:
  --verbose, -v      Log every processed line (LOG_LEVEL=debug)
  --help, -h         Show this help message
  --version          Show version information

Environment Variables:
  NODE_ENV             Environment (development/test/staging/production)
  APP_NAME             Root description and welcome name
  LOG_LEVEL            Logging level (error/warn/info/debug)
  LOG_FORMAT           Log output (json/pretty)
  LOG_FILE             Also write logs to this file
  SHELL_PROMPT         Console prompt
  DISCORD_ENABLED      Answer Discord messages instead of the console
  DISCORD_TOKEN        Discord bot token
  DISCORD_CHANNEL_ID   Only answer in this channel
  CLOCK_TIMEZONE       Zone for "showdatetime"

Examples:
  tapline tu cw the bird is the word
  tapline calc add 1 2 3
  tapline help calc
`;
}

/**
 * @returns Process exit code
 */
export async function start(options: StartOptions = {}): Promise<number> {
  const argv = options.argv ?? process.argv.slice(2);
  const env = options.env ?? process.env;
  const output = options.output ?? process.stdout;
  const errorOutput = options.errorOutput ?? process.stderr;
  const flags = parseFlags(argv);

  if (flags.help) {
    output.write(usage());
    return 0;
  }

  let config: Config;
  try {
    config = loadConfig(flags.verbose ? { ...env, LOG_LEVEL: 'debug' } : env);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      errorOutput.write(`${error.message}\n`);
      return 1;
    }
    throw error;
  }

  if (flags.version) {
    output.write(`${config.app.name} v${config.app.version}\n`);
    return 0;
  }

  const logger = createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });

  attachGlobalHandlers(logger);

  let processor: CommandProcessor;
  try {
    processor = await withRequestContext(async () => {
      const timer = startTimer();
      logger.info('Starting tapline', { ...getConfigSummary(config), operation: 'app_startup' });

      const commandSet = createCommandSet({
        name: config.app.name,
        timezone: config.clock.timezone,
        logger,
      });

      logger.info('Command set ready', {
        operation: 'app_startup',
        duration_ms: timer.stop(),
        result: 'success',
      });
      return commandSet;
    });
  } catch (error) {
    if (isConfigurationError(error)) {
      logger.error('Command set is invalid', { operation: 'app_startup', error: error.toJSON() });
      errorOutput.write(`${error.format(flags.verbose)}\n`);
      return 1;
    }
    throw error;
  }

  if (flags.line.length > 0) {
    const reply = await withCLIRequestContext('cli:line')(async () => processor.processLine(flags.line));
    output.write(`${reply}\n`);
    return 0;
  }

  if (config.discord.enabled) {
    return runDiscord(config, processor, logger);
  }

  await new ConsoleShell({
    processor,
    name: config.app.name,
    prompt: config.shell.prompt,
    input: options.input,
    output,
    logger,
  }).run();
  return 0;
}

async function runDiscord(config: Config, processor: CommandProcessor, logger: Logger): Promise<number> {
  const { token, channelId } = config.discord;
  if (!token) {
    logger.error('Discord is enabled but no token is configured');
    return 1;
  }

  const bot = new DiscordBot({ processor, name: config.app.name, token, channelId, logger });
  await bot.start();

  return new Promise((resolve) => {
    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info('Shutting down', { signal });
      bot.stop().then(
        () => resolve(0),
        (error: unknown) => {
          logger.error('Error during shutdown', { error });
          resolve(1);
        }
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}
