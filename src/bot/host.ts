/**
 * BotHost - the object every extension's setup() receives
 *
 * Wraps the Slack Bolt App so extensions get:
 * - Command registration with validation
 * - Logging of all extension commands
 * - Protection against duplicate commands
 * - Read access to the active mode and the extension registry
 *
 * Extensions run with full process privileges. This wrapper keeps
 * registrations consistent; it is not a sandbox.
 */

import type { App, SlackCommandMiddlewareArgs, AllMiddlewareArgs } from '@slack/bolt';
import type { ExtensionEntry } from '../extensions/registry.js';
import { modeNames, type ModeMask, type ModeName } from '../extensions/modes.js';
import { logger as defaultLogger, errorMeta, type Logger } from '../utils/logger.js';

/**
 * Command handler type (matches Bolt's command handler signature)
 */
export type CommandHandler = (
  args: SlackCommandMiddlewareArgs & AllMiddlewareArgs
) => Promise<void>;

/**
 * The slice of the Bolt App the host needs
 */
export type CommandApp = Pick<App, 'command'>;

export interface BotHost {
  /** Active mode mask of this process */
  readonly mode: ModeMask;
  /** Names of the active modes */
  readonly modeNames: ModeName[];
  /** Application logger */
  readonly logger: Logger;

  /**
   * Register a slash command
   * @param name - Command name including leading slash (e.g., '/mycommand')
   * @param handler - Async handler function
   * @throws Error if the name is malformed or already registered
   */
  command(name: string, handler: CommandHandler): void;

  /** Commands registered through this host */
  commands(): string[];

  /** Every extension recorded so far, with its status */
  extensions(): ExtensionEntry[];
}

export interface BotHostOptions {
  mode: ModeMask;
  listExtensions: () => ExtensionEntry[];
  logger?: Logger;
}

/**
 * Validate command name format
 */
export function isValidCommandName(name: string): boolean {
  // Must start with / and contain only lowercase letters, numbers, hyphens
  return /^\/[a-z][a-z0-9-]{0,20}$/.test(name);
}

/**
 * Create the host handed to extensions
 *
 * @param app - The real Slack Bolt App instance
 */
export function createBotHost(app: CommandApp, options: BotHostOptions): BotHost {
  const log = options.logger ?? defaultLogger;
  const registeredCommands = new Set<string>();

  return {
    mode: options.mode,
    modeNames: modeNames(options.mode),
    logger: log,

    command(name: string, handler: CommandHandler): void {
      if (!isValidCommandName(name)) {
        log.error('Extension registered invalid command name', {
          command: name,
          reason: 'Must start with /, contain only lowercase letters, numbers, hyphens, max 21 chars',
        });
        throw new Error(
          `Invalid command name "${name}": must start with /, contain only lowercase letters, numbers, hyphens, max 21 chars`
        );
      }

      if (registeredCommands.has(name)) {
        log.error('Extension attempted to register duplicate command', { command: name });
        throw new Error(`Command "${name}" is already registered`);
      }

      log.debug('Registering command', { command: name });

      const wrappedHandler: CommandHandler = async (args) => {
        const { command } = args;
        log.info('Command invoked', {
          command: name,
          user: command.user_id,
          channel: command.channel_id,
        });

        try {
          await handler(args);
        } catch (error) {
          log.error('Command error', { command: name, ...errorMeta(error) });
          throw error;
        }
      };

      app.command(name, wrappedHandler);
      registeredCommands.add(name);
    },

    commands(): string[] {
      return Array.from(registeredCommands);
    },

    extensions(): ExtensionEntry[] {
      return options.listExtensions();
    },
  };
}
