/**
 * Configuration schema using Zod
 */

import moment from 'moment-timezone';
import { z } from 'zod';

/**
 * Application configuration schema
 */
export const configSchema = z
  .object({
    app: z
      .object({
        env: z.enum(['development', 'test', 'staging', 'production']).default('development'),
        name: z.string().min(1).default('Tapline test console'),
        version: z.string().default('0.1.0'),
      })
      .default({}),

    logging: z
      .object({
        level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
        format: z.enum(['json', 'pretty']).default('pretty'),
        filePath: z.string().optional(),
      })
      .default({}),

    shell: z
      .object({
        prompt: z.string().default('> '),
      })
      .default({}),

    discord: z
      .object({
        enabled: z.boolean().default(false),
        token: z.string().min(1).optional(),
        // Unset: answer in every channel the bot can read
        channelId: z.string().min(1).optional(),
      })
      .default({}),

    clock: z
      .object({
        timezone: z
          .string()
          .default('UTC')
          .refine((zone) => moment.tz.zone(zone) !== null, { message: 'Unknown time zone' }),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (config.discord.enabled && !config.discord.token) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['discord', 'token'],
        message: 'Required when discord.enabled is true',
      });
    }
  });

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  APP_NAME: 'app.name',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  SHELL_PROMPT: 'shell.prompt',
  DISCORD_ENABLED: 'discord.enabled',
  DISCORD_TOKEN: 'discord.token',
  DISCORD_CHANNEL_ID: 'discord.channelId',
  CLOCK_TIMEZONE: 'clock.timezone',
};
