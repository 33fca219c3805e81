import { describe, it, expect } from 'vitest';
import { describeModes, metadata, setup } from '../../src/builtin/dev/botmode.js';
import { Mode } from '../../src/extensions/modes.js';
import { createFakeHost } from '../helpers/host.js';

describe('botmode extension', () => {
  it('should only load in development modes', () => {
    expect(metadata.loadIfMode).toBe(Mode.DEVELOPMENT | Mode.PLUGIN_DEVELOPMENT);
  });

  describe('describeModes', () => {
    it('should list active modes', () => {
      expect(describeModes(Mode.PRODUCTION | Mode.DEVELOPMENT)).toBe('Running in: `PRODUCTION`, `DEVELOPMENT`');
    });

    it('should handle an empty mask', () => {
      expect(describeModes(0)).toBe('No modes active');
    });
  });

  it('should respond with the host mode', async () => {
    const { host, invoke } = createFakeHost(Mode.PLUGIN_DEVELOPMENT);
    setup(host);

    const { respond } = await invoke('/botmode');

    expect(respond).toHaveBeenCalledWith({
      response_type: 'ephemeral',
      text: 'Running in: `PLUGIN_DEVELOPMENT`',
    });
  });
});
