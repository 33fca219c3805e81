import { describe, it, expect } from 'vitest';
import { resolve } from 'path';
import { metadata, setup } from '../../plugins.example/devtools/echo.js';
import { discoverExtensions } from '../../src/extensions/discovery.js';
import { Mode } from '../../src/extensions/modes.js';
import { createFakeHost } from '../helpers/host.js';
import { createFakeLogger } from '../helpers/logger.js';

describe('echo plugin', () => {
  it('should only load in plugin development', () => {
    expect(metadata.loadIfMode).toBe(Mode.PLUGIN_DEVELOPMENT);
  });

  it('should echo the command text', async () => {
    const { host, invoke } = createFakeHost(Mode.PLUGIN_DEVELOPMENT);
    setup(host);

    const { ack, respond } = await invoke('/echo', 'hello there');

    expect(ack).toHaveBeenCalledTimes(1);
    expect(respond).toHaveBeenCalledWith({ response_type: 'ephemeral', text: 'hello there' });
  });

  it('should answer empty input with a placeholder', async () => {
    const { host, invoke } = createFakeHost(Mode.PLUGIN_DEVELOPMENT);
    setup(host);

    const { respond } = await invoke('/echo');

    expect(respond).toHaveBeenCalledWith({ response_type: 'ephemeral', text: '(empty)' });
  });
});

describe('example plugin discovery', () => {
  it('should name plugins after their path and gate them by mode', async () => {
    const seen: [string, boolean][] = [];
    for await (const result of discoverExtensions(resolve(process.cwd(), 'plugins.example'), {
      rootName: 'bot.plugins',
      activeMode: Mode.PLUGIN_DEVELOPMENT,
      logger: createFakeLogger(),
    })) {
      seen.push([result.identity.name, result.eligible]);
    }

    expect(seen).toEqual([
      ['bot.plugins.devtools.echo', true],
      ['bot.plugins.dice', false],
    ]);
  });
});
