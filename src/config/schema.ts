import { z } from 'zod';
import { MODE_NAMES, modesFromNames, parseModeName } from '../extensions/modes.js';
import { LOG_LEVELS, isLogLevel } from '../utils/logger.js';

/**
 * Bot mode list: names of {@link MODE_NAMES}, turned into a mask
 */
const BotModeSchema = z
  .array(z.string())
  .min(1, 'At least one bot mode is required')
  .refine(
    (names) => names.every((name) => parseModeName(name) !== null),
    `Bot modes must be among: ${MODE_NAMES.join(', ')}`
  )
  .transform((names) => modesFromNames(names));

const LogLevelSchema = z
  .string()
  .refine(isLogLevel, `Log level must be one of: ${Object.keys(LOG_LEVELS).join(', ')}`);

/**
 * Configuration schema for the bot
 */
export const ConfigSchema = z.object({
  slack: z.object({
    /** Bot User OAuth Token (xoxb-...) */
    botToken: z.string().startsWith('xoxb-', 'Bot token must start with xoxb-'),
    /** App-Level Token for Socket Mode (xapp-...) */
    appToken: z.string().startsWith('xapp-', 'App token must start with xapp-'),
  }),

  extensions: z.object({
    /** Active bot mode mask */
    mode: BotModeSchema,
    /** Directory scanned for user plugins */
    pluginsDir: z.string().min(1).default('./plugins.local'),
    /** Time allowed for each extension's setup() */
    setupTimeoutMs: z.number().int().positive().default(10_000),
  }),

  logging: z.object({
    /** Log level */
    level: LogLevelSchema.default('info'),
    /** Optional rotating log file */
    file: z.string().optional(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Raw input before validation
 */
export type RawConfig = z.input<typeof ConfigSchema>;
