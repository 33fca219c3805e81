import type { ExtensionModule } from './loader.js';

/**
 * Name of the entry point every extension exports
 */
export const ENTRY_POINT = 'setup';

/**
 * Registration hook of an extension
 *
 * Called once with the host when the extension is activated. The return
 * value is not used beyond awaiting it.
 */
export type SetupFunction<THost> = (host: THost) => void | Promise<void>;

/**
 * A loaded module confirmed to be an extension
 */
export interface Extension<THost> {
  readonly setup: SetupFunction<THost>;
  readonly module: ExtensionModule;
}

function isSetupFunction<THost>(value: unknown): value is SetupFunction<THost> {
  return typeof value === 'function' && value.length === 1;
}

/**
 * Check a loaded module for the extension entry point
 *
 * An extension exports `setup` as a function declaring exactly one parameter,
 * the host. Anything else is not an extension.
 *
 * @returns The extension, or undefined if the module lacks a valid entry point
 */
export function findEntryPoint<THost>(module: ExtensionModule): Extension<THost> | undefined {
  const setup = module[ENTRY_POINT];
  if (!isSetupFunction<THost>(setup)) {
    return undefined;
  }
  return { setup, module };
}
