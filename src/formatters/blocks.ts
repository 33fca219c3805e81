import type { ContextBlock, HeaderBlock, KnownBlock, MrkdwnElement, SectionBlock } from '@slack/types';
import type { ExtensionStatus } from '../extensions/registry.js';

/**
 * Block Kit builders for extension replies
 */

function mrkdwn(text: string): MrkdwnElement {
  return { type: 'mrkdwn', text };
}

export function header(text: string): HeaderBlock {
  return {
    type: 'header',
    text: { type: 'plain_text', text, emoji: true },
  };
}

export function section(text: string): SectionBlock {
  return { type: 'section', text: mrkdwn(text) };
}

/**
 * Muted footnote; each line becomes its own element
 */
export function context(...lines: string[]): ContextBlock {
  return { type: 'context', elements: lines.map(mrkdwn) };
}

const STATUS_EMOJI: Record<ExtensionStatus, string> = {
  loaded: ':large_green_circle:',
  disabled: ':white_circle:',
  failed: ':red_circle:',
  duplicate: ':large_yellow_circle:',
};

export function statusEmoji(status: ExtensionStatus): string {
  return STATUS_EMOJI[status];
}

export interface EphemeralReply {
  response_type: 'ephemeral';
  blocks: KnownBlock[];
}

/**
 * Reply only the invoking user sees
 */
export function ephemeral(blocks: KnownBlock[]): EphemeralReply {
  return { response_type: 'ephemeral', blocks };
}
