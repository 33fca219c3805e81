import type { BotHost } from '../bot/host.js';

/**
 * /ping - check that the bot is up
 *
 * Declares no metadata, so it runs in production mode only.
 */
export function setup(host: BotHost): void {
  host.command('/ping', async ({ ack, respond }) => {
    await ack();
    await respond({ response_type: 'ephemeral', text: 'Pong!' });
  });
}
