import { extname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { App, LogLevel } from '@slack/bolt';
import { loadConfig, type Config } from './config/index.js';
import { createBotHost } from './bot/host.js';
import { ExtensionRegistry, type ExtensionSource } from './extensions/registry.js';
import { modeNames } from './extensions/modes.js';
import { logger, configureLogging, errorMeta } from './utils/logger.js';

/**
 * Slack bot host
 *
 * Connects to Slack via Socket Mode and activates the built-in extensions
 * and user plugins allowed in the configured bot mode.
 */

/**
 * Built-in extensions sit beside this file and share its suffix, so they are
 * found both when running from sources and from the compiled output.
 */
const BUILTIN_DIR = fileURLToPath(new URL('./builtin', import.meta.url));
const BUILTIN_SUFFIX = extname(fileURLToPath(import.meta.url));

// Map our log level to Bolt's LogLevel
function getBoltLogLevel(level: Config['logging']['level']): LogLevel {
  switch (level) {
    case 'trace':
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
    case 'notice':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Extension roots in activation order
 */
function extensionSources(config: Config): ExtensionSource[] {
  return [
    { root: BUILTIN_DIR, rootName: 'bot.builtin', suffix: BUILTIN_SUFFIX },
    { root: resolve(process.cwd(), config.extensions.pluginsDir), rootName: 'bot.plugins', suffix: '.ts', optional: true },
  ];
}

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogging(config.logging);

  const app = new App({
    token: config.slack.botToken,
    appToken: config.slack.appToken,
    socketMode: true,
    logLevel: getBoltLogLevel(config.logging.level),
  });

  // Handle errors
  app.error((error): Promise<void> => {
    logger.error('Unhandled error in Bolt app', {
      error: error.message,
      stack: error.stack,
    });
    return Promise.resolve();
  });

  const host = createBotHost(app, {
    mode: config.extensions.mode,
    listExtensions: () => registry.entries(),
  });
  const registry = new ExtensionRegistry(host, { setupTimeoutMs: config.extensions.setupTimeoutMs });

  // Graceful shutdown handler
  async function shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    try {
      await app.stop();
      logger.info('App stopped successfully');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', errorMeta(error));
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await registry.registerAll(extensionSources(config), config.extensions.mode);

  await app.start();
  logger.info('Bot is running!', {
    socketMode: true,
    modes: modeNames(config.extensions.mode),
    extensions: registry.loaded(),
    commands: host.commands(),
  });
}

main().catch((error: unknown) => {
  logger.error('Failed to start app', errorMeta(error));
  process.exit(1);
});
