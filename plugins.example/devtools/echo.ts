/**
 * Echo Plugin - repeat the command text back, for testing plugin wiring
 *
 * Only active when the bot runs with BOT_MODE including plugin_development.
 */

import type { BotHost } from '../../src/bot/host.js';
import { Mode, defineMetadata } from '../../src/extensions/index.js';

export const metadata = defineMetadata({ loadIfMode: Mode.PLUGIN_DEVELOPMENT });

export function setup(host: BotHost): void {
  host.command('/echo', async ({ ack, respond, command }) => {
    await ack();
    host.logger.debug('Echo invoked', { user: command.user_id });
    await respond({ response_type: 'ephemeral', text: command.text || '(empty)' });
  });
}
