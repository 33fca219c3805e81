/**
 * Dice Plugin - roll dice in a channel
 *
 * Commands:
 * - /roll            - Roll one six-sided die
 * - /roll <n>d<s>    - Roll n dice with s sides (e.g. 2d20), up to 20 dice
 */

import type { BotHost } from '../src/bot/host.js';
import { Mode, combineModes, defineMetadata } from '../src/extensions/index.js';

export const metadata = defineMetadata({
  loadIfMode: combineModes(Mode.PRODUCTION, Mode.DEVELOPMENT),
});

const MAX_DICE = 20;
const MAX_SIDES = 1000;

export interface DiceSpec {
  count: number;
  sides: number;
}

/**
 * Parse "NdS" notation; empty input means 1d6
 * @returns The dice, or null if invalid
 */
export function parseDice(text: string): DiceSpec | null {
  const trimmed = text.trim().toLowerCase();
  if (trimmed === '') {
    return { count: 1, sides: 6 };
  }

  const match = /^(\d{0,2})d(\d{1,4})$/.exec(trimmed);
  if (!match) {
    return null;
  }

  const count = match[1] ? parseInt(match[1], 10) : 1;
  const sides = parseInt(match[2], 10);
  if (count < 1 || count > MAX_DICE || sides < 2 || sides > MAX_SIDES) {
    return null;
  }

  return { count, sides };
}

/**
 * Roll the dice
 * @param random - Source of numbers in [0, 1)
 */
export function roll(dice: DiceSpec, random: () => number = Math.random): number[] {
  return Array.from({ length: dice.count }, () => Math.floor(random() * dice.sides) + 1);
}

export function setup(host: BotHost): void {
  host.command('/roll', async ({ ack, respond, command }) => {
    await ack();

    const dice = parseDice(command.text);
    if (!dice) {
      await respond({ response_type: 'ephemeral', text: `Usage: /roll [N]dS, up to ${String(MAX_DICE)} dice` });
      return;
    }

    const rolls = roll(dice);
    const total = rolls.reduce((sum, value) => sum + value, 0);
    await respond({
      response_type: 'in_channel',
      text: `:game_die: ${String(dice.count)}d${String(dice.sides)}: ${rolls.join(' + ')} = *${String(total)}*`,
    });
  });
}
