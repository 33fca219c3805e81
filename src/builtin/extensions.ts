import type { KnownBlock } from '@slack/types';
import type { BotHost } from '../bot/host.js';
import type { ExtensionEntry } from '../extensions/registry.js';
import { ALL_MODES } from '../extensions/modes.js';
import { defineMetadata } from '../extensions/metadata.js';
import { header, section, context, ephemeral, statusEmoji } from '../formatters/blocks.js';

export const metadata = defineMetadata({ loadIfMode: ALL_MODES });

/**
 * Slack allows 50 blocks per message; header and footer take three
 */
const MAX_LISTED = 45;

function formatEntry(entry: ExtensionEntry): string {
  const modes = entry.modes.length > 0 ? entry.modes.join(', ') : 'none';
  let text = `${statusEmoji(entry.status)} \`${entry.name}\` - ${entry.status}\n_Modes: ${modes}_`;
  if (entry.error) {
    text += `\n> ${entry.error}`;
  }
  return text;
}

/**
 * Render the extension list
 */
export function extensionBlocks(entries: ExtensionEntry[], activeModes: string[]): KnownBlock[] {
  const blocks: KnownBlock[] = [header('Extensions'), context(`Active modes: ${activeModes.join(', ')}`)];

  if (entries.length === 0) {
    blocks.push(section('No extensions discovered.'));
    return blocks;
  }

  for (const entry of entries.slice(0, MAX_LISTED)) {
    blocks.push(section(formatEntry(entry)));
  }

  if (entries.length > MAX_LISTED) {
    blocks.push(context(`...and ${String(entries.length - MAX_LISTED)} more`));
  }

  return blocks;
}

/**
 * /extensions - list discovered extensions and their status
 */
export function setup(host: BotHost): void {
  host.command('/extensions', async ({ ack, respond }) => {
    await ack();
    await respond(ephemeral(extensionBlocks(host.extensions(), host.modeNames)));
  });
}
