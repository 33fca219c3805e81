import type { BotHost } from '../../bot/host.js';
import { Mode, combineModes, modeNames } from '../../extensions/modes.js';
import { defineMetadata } from '../../extensions/metadata.js';

export const metadata = defineMetadata({
  loadIfMode: combineModes(Mode.DEVELOPMENT, Mode.PLUGIN_DEVELOPMENT),
});

export function describeModes(mask: number): string {
  const names = modeNames(mask);
  return names.length > 0 ? `Running in: ${names.map((name) => `\`${name}\``).join(', ')}` : 'No modes active';
}

/**
 * /botmode - show the active bot modes (development only)
 */
export function setup(host: BotHost): void {
  host.command('/botmode', async ({ ack, respond }) => {
    await ack();
    await respond({ response_type: 'ephemeral', text: describeModes(host.mode) });
  });
}
