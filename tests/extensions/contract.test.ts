import { describe, it, expect } from 'vitest';
import { findEntryPoint } from '../../src/extensions/contract.js';

describe('findEntryPoint', () => {
  it('should accept a setup function taking the host', () => {
    const setup = (host: unknown): void => {
      void host;
    };
    const module = { setup };

    const extension = findEntryPoint(module);

    expect(extension?.setup).toBe(setup);
    expect(extension?.module).toBe(module);
  });

  it('should accept an async setup function', () => {
    const module = {
      async setup(host: unknown): Promise<void> {
        await Promise.resolve(host);
      },
    };

    expect(findEntryPoint(module)).toBeDefined();
  });

  it('should reject a module without setup', () => {
    expect(findEntryPoint({ value: 42 })).toBeUndefined();
  });

  it('should reject a setup that is not a function', () => {
    expect(findEntryPoint({ setup: 'setup' })).toBeUndefined();
    expect(findEntryPoint({ setup: { call: () => undefined } })).toBeUndefined();
  });

  it('should reject a setup declaring no parameters', () => {
    expect(findEntryPoint({ setup: () => undefined })).toBeUndefined();
  });

  it('should reject a setup declaring more than one parameter', () => {
    const setup = (host: unknown, extra: unknown): void => {
      void host;
      void extra;
    };
    expect(findEntryPoint({ setup })).toBeUndefined();
  });
});
