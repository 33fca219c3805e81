import { readdir, stat } from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import { join, resolve } from 'path';
import { decideActivation } from './activation.js';
import { findEntryPoint, type Extension } from './contract.js';
import { DiscoveryError } from './errors.js';
import { resolveIdentity, type ExtensionIdentity } from './identity.js';
import { jitiImporter, loadExtensionModule, type ModuleImporter } from './loader.js';
import { resolveMetadata, type ExtensionMetadata } from './metadata.js';
import type { ModeMask, ModeName } from './modes.js';
import { createLogger, errorMeta, type Logger } from '../utils/logger.js';

/**
 * Directories never descended into
 */
const IGNORED_DIRECTORIES = new Set(['node_modules']);

export interface DiscoveryOptions {
  /** Qualified name of the root, prefixed to every extension name */
  rootName: string;
  /** Active mode mask, constant for the run */
  activeMode: ModeMask;
  /** Source suffix of extension files (default: `.ts`) */
  suffix?: string;
  /** Diagnostics handle (default: the `extensions` component logger) */
  logger?: Logger;
  /** Module importer (default: jiti) */
  importer?: ModuleImporter;
}

/**
 * One discovered extension and the decision for it
 */
export interface DiscoveryResult<THost> {
  readonly identity: ExtensionIdentity;
  /** Whether the extension may be activated under the active mode */
  readonly eligible: boolean;
  /** Modes the extension declares */
  readonly modes: ModeName[];
  /** Validated entry point, ready for the caller to activate */
  readonly extension: Extension<THost>;
}

function compareNames(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

async function assertRoot(root: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await stat(root);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new DiscoveryError('ROOT_NOT_FOUND', root, `Extension root does not exist: ${root}`, { cause: error });
    }
    throw new DiscoveryError('ROOT_UNREADABLE', root, `Extension root is not readable: ${root}`, { cause: error });
  }

  if (!stats.isDirectory()) {
    throw new DiscoveryError('ROOT_NOT_DIRECTORY', root, `Extension root is not a directory: ${root}`);
  }
}

async function listRoot(root: string): Promise<Dirent[]> {
  try {
    return await readdir(root, { withFileTypes: true });
  } catch (error) {
    throw new DiscoveryError('ROOT_UNREADABLE', root, `Extension root is not readable: ${root}`, { cause: error });
  }
}

/**
 * Walks a directory tree for extensions
 *
 * Iterating the instance starts a fresh walk of the filesystem each time;
 * nothing is cached between runs.
 *
 * @example
 * ```typescript
 * const discovery = new ExtensionDiscovery<BotHost>('plugins.local', {
 *   rootName: 'bot.plugins',
 *   activeMode: Mode.PRODUCTION,
 * });
 * for await (const result of discovery) {
 *   if (result.eligible) await result.extension.setup(host);
 * }
 * ```
 */
export class ExtensionDiscovery<THost> implements AsyncIterable<DiscoveryResult<THost>> {
  readonly root: string;
  readonly rootName: string;
  readonly activeMode: ModeMask;
  readonly suffix: string;
  private readonly logger: Logger;
  private readonly importer: ModuleImporter;

  constructor(root: string, options: DiscoveryOptions) {
    this.root = resolve(root);
    this.rootName = options.rootName;
    this.activeMode = options.activeMode;
    this.suffix = options.suffix ?? '.ts';
    this.logger = options.logger ?? createLogger('extensions');
    this.importer = options.importer ?? jitiImporter;
  }

  [Symbol.asyncIterator](): AsyncGenerator<DiscoveryResult<THost>> {
    return this.discover();
  }

  /**
   * Yield every extension under the root, depth first, siblings in name order
   *
   * Each candidate is loaded, validated and decided before the next entry is
   * looked at. Failures of a single candidate are logged and skipped.
   *
   * @throws DiscoveryError on the first pull if the root is missing, not a
   *   directory or unreadable
   */
  async *discover(): AsyncGenerator<DiscoveryResult<THost>> {
    await assertRoot(this.root);
    const entries = await listRoot(this.root);

    this.logger.debug('Discovering extensions', { root: this.root, rootName: this.rootName });
    yield* this.walkEntries(this.root, entries);
  }

  private async *walk(dir: string): AsyncGenerator<DiscoveryResult<THost>> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      this.logger.warn('Failed to read extension directory, skipping it', {
        directory: dir,
        ...errorMeta(error),
      });
      return;
    }

    yield* this.walkEntries(dir, entries);
  }

  private async *walkEntries(dir: string, entries: Dirent[]): AsyncGenerator<DiscoveryResult<THost>> {
    for (const entry of [...entries].sort(compareNames)) {
      const path = join(dir, entry.name);

      if (entry.isDirectory()) {
        if (!IGNORED_DIRECTORIES.has(entry.name)) {
          yield* this.walk(path);
        }
        continue;
      }

      if (entry.isSymbolicLink() && !(await this.isLinkedFile(path))) {
        continue;
      }

      if ((entry.isFile() || entry.isSymbolicLink()) && entry.name.endsWith(this.suffix)) {
        const result = await this.inspect(path);
        if (result) {
          yield result;
        }
      }
    }
  }

  /**
   * Whether a symbolic link points at a regular file
   *
   * Linked directories are not followed.
   */
  private async isLinkedFile(path: string): Promise<boolean> {
    let target: Stats;
    try {
      target = await stat(path);
    } catch (error) {
      this.logger.warn('Broken symbolic link in extension directory, skipping it', {
        file: path,
        ...errorMeta(error),
      });
      return false;
    }

    if (target.isDirectory()) {
      this.logger.trace('Skipping symlinked directory', { directory: path });
      return false;
    }
    return target.isFile();
  }

  /**
   * Run one candidate file through identity, load, contract and activation
   */
  private async inspect(path: string): Promise<DiscoveryResult<THost> | null> {
    const resolved = resolveIdentity(this.root, path, { rootName: this.rootName, suffix: this.suffix });

    if (resolved.kind === 'private') {
      this.logger.trace('Skipping private extension', { extension: resolved.name });
      return null;
    }
    if (resolved.kind === 'invalid') {
      this.logger.trace('Skipping file without a valid extension name', { file: path, reason: resolved.reason });
      return null;
    }

    const { identity } = resolved;
    this.logger.trace('Inspecting extension candidate', { extension: identity.name, file: identity.relativePath });

    const load = await loadExtensionModule(identity, this.logger, this.importer);
    if (!load.loaded) {
      return null;
    }

    let extension: Extension<THost> | undefined;
    try {
      extension = findEntryPoint<THost>(load.module);
    } catch (error) {
      this.logger.error('Failed to read extension entry point, it is not considered installed', {
        extension: identity.name,
        file: identity.path,
        ...errorMeta(error),
      });
      return null;
    }
    if (!extension) {
      this.logger.trace('Module has no setup(host) function, skipping', { extension: identity.name });
      return null;
    }

    let metadata: ExtensionMetadata;
    try {
      metadata = resolveMetadata(load.module, identity.name, this.logger);
    } catch (error) {
      this.logger.error('Extension declares invalid metadata, it is not considered installed', {
        extension: identity.name,
        file: identity.path,
        ...errorMeta(error),
      });
      return null;
    }

    const { eligible, modes } = decideActivation(metadata.loadIfMode, this.activeMode);
    this.logger.trace('Activation decided', { extension: identity.name, eligible, modes });

    return { identity, eligible, modes, extension };
  }
}

/**
 * Discover extensions under `root`
 *
 * Shorthand for iterating a new {@link ExtensionDiscovery}.
 */
export function discoverExtensions<THost>(
  root: string,
  options: DiscoveryOptions
): AsyncGenerator<DiscoveryResult<THost>> {
  return new ExtensionDiscovery<THost>(root, options).discover();
}
