import { ConfigSchema, type Config, type RawConfig } from './schema.js';

/**
 * Parse a comma-separated string into an array, filtering empty values
 */
export function parseCommaSeparated(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Parse an integer from environment variable with a default value
 */
export function parseIntWithDefault(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Map environment variables onto the config shape
 */
export function readEnv(env: NodeJS.ProcessEnv): RawConfig {
  return {
    slack: {
      botToken: env.SLACK_BOT_TOKEN ?? '',
      appToken: env.SLACK_APP_TOKEN ?? '',
    },
    extensions: {
      mode: env.BOT_MODE === undefined ? ['production'] : parseCommaSeparated(env.BOT_MODE),
      pluginsDir: env.PLUGINS_DIR ?? './plugins.local',
      setupTimeoutMs: parseIntWithDefault(env.EXTENSION_SETUP_TIMEOUT_MS, 10_000),
    },
    logging: {
      level: env.LOG_LEVEL?.toLowerCase() ?? 'info',
      file: env.LOG_FILE ?? undefined,
    },
  };
}

/**
 * Load and validate configuration from environment variables
 * @throws Error listing every invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse(readEnv(env));

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

export { type Config } from './schema.js';
