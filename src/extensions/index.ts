/**
 * Extension System
 *
 * Extensions are source files that export a `setup(host)` function. They are
 * discovered from `src/builtin/` and from `plugins.local/` (gitignored), and
 * activated only when their declared modes include one of the bot's active
 * modes.
 *
 * Files and directories whose name starts with `_` are never loaded as
 * extensions; use them for shared helpers.
 *
 * Example plugin (`plugins.local/hello.ts`, qualified name `bot.plugins.hello`):
 * ```typescript
 * import type { BotHost } from '../src/bot/host.js';
 * import { Mode, combineModes, defineMetadata } from '../src/extensions/index.js';
 *
 * export const metadata = defineMetadata({
 *   loadIfMode: combineModes(Mode.PRODUCTION, Mode.DEVELOPMENT),
 * });
 *
 * export function setup(host: BotHost): void {
 *   host.command('/hello', async ({ ack, respond }) => {
 *     await ack();
 *     await respond('Hello from my plugin!');
 *   });
 * }
 * ```
 *
 * Without a `metadata` export an extension runs in production mode only.
 */

// Modes and metadata for extension authors
export {
  Mode,
  MODE_NAMES,
  ALL_MODES,
  combineModes,
  includesMode,
  intersects,
  modeNames,
  isModeMask,
  parseModeName,
  modesFromNames,
} from './modes.js';
export type { ModeName, ModeFlag, ModeMask } from './modes.js';
export { defineMetadata, DEFAULT_METADATA, InvalidMetadataError } from './metadata.js';
export type { ExtensionMetadata } from './metadata.js';
export type { SetupFunction, Extension } from './contract.js';

// Discovery and activation for internal use
export { ExtensionDiscovery, discoverExtensions } from './discovery.js';
export type { DiscoveryOptions, DiscoveryResult } from './discovery.js';
export { DiscoveryError } from './errors.js';
export type { DiscoveryErrorCode } from './errors.js';
export { resolveIdentity } from './identity.js';
export type { ExtensionIdentity, IdentityResult } from './identity.js';
export { decideActivation } from './activation.js';
export type { ActivationDecision } from './activation.js';
export { ExtensionRegistry, DEFAULT_SETUP_TIMEOUT_MS } from './registry.js';
export type { ExtensionEntry, ExtensionSource, ExtensionStatus } from './registry.js';
