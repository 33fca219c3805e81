import { DiscoveryError } from './errors.js';
import { ExtensionDiscovery, type DiscoveryOptions, type DiscoveryResult } from './discovery.js';
import type { ModeName } from './modes.js';
import { createLogger, errorMeta, type Logger } from '../utils/logger.js';

/**
 * Default time allowed for an extension's setup()
 */
export const DEFAULT_SETUP_TIMEOUT_MS = 10_000;

export type ExtensionStatus = 'loaded' | 'disabled' | 'failed' | 'duplicate';

/**
 * What happened to one discovered extension
 */
export interface ExtensionEntry {
  name: string;
  file: string;
  status: ExtensionStatus;
  modes: ModeName[];
  /** Failure message for `failed` entries */
  error?: string;
}

/**
 * A root to discover extensions under
 */
export interface ExtensionSource {
  root: string;
  rootName: string;
  suffix?: string;
  /** A missing or unreadable optional root is skipped instead of failing */
  optional?: boolean;
}

export interface RegistryOptions {
  logger?: Logger;
  setupTimeoutMs?: number;
  /** Passed through to every discovery run */
  importer?: DiscoveryOptions['importer'];
}

/**
 * Wrap a promise with a timeout
 * @param promise - Promise to wrap
 * @param ms - Timeout in milliseconds
 * @param operation - Description for error message
 */
async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  operation: string
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new Error(`${operation} timed out after ${String(ms)}ms`));
    }, ms);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) clearTimeout(timeoutId);
  }
}

/**
 * Activates discovered extensions against one host
 *
 * Discovery only reports decisions; this is where eligible extensions have
 * their setup() called and where the outcome of each is recorded.
 * Extensions are activated one at a time, in discovery order.
 */
export class ExtensionRegistry<THost> {
  private readonly host: THost;
  private readonly logger: Logger;
  private readonly setupTimeoutMs: number;
  private readonly importer: DiscoveryOptions['importer'];
  private readonly byName = new Map<string, ExtensionEntry>();

  constructor(host: THost, options: RegistryOptions = {}) {
    this.host = host;
    this.logger = options.logger ?? createLogger('extensions');
    this.setupTimeoutMs = options.setupTimeoutMs ?? DEFAULT_SETUP_TIMEOUT_MS;
    this.importer = options.importer;
  }

  /**
   * Activate every eligible result from a discovery run
   * @returns Entries recorded during this call, in order
   */
  async activate(results: AsyncIterable<DiscoveryResult<THost>>): Promise<ExtensionEntry[]> {
    const recorded: ExtensionEntry[] = [];

    for await (const result of results) {
      const entry = await this.activateOne(result);
      recorded.push(entry);
    }

    return recorded;
  }

  /**
   * Discover and activate extensions under each source, in order
   *
   * @param activeMode - Active mode mask for the discovery runs
   * @throws DiscoveryError for a required source whose root is unusable
   */
  async registerAll(sources: readonly ExtensionSource[], activeMode: DiscoveryOptions['activeMode']): Promise<void> {
    for (const source of sources) {
      const discovery = new ExtensionDiscovery<THost>(source.root, {
        rootName: source.rootName,
        suffix: source.suffix,
        activeMode,
        logger: this.logger,
        importer: this.importer,
      });

      try {
        await this.activate(discovery);
      } catch (error) {
        if (source.optional && error instanceof DiscoveryError) {
          this.logger.debug('Skipping optional extension root', { root: source.root, reason: error.message });
          continue;
        }
        throw error;
      }
    }

    this.logger.info('Extension registration complete', {
      loaded: this.loaded().length,
      disabled: this.count('disabled'),
      failed: this.count('failed'),
    });
  }

  private async activateOne(result: DiscoveryResult<THost>): Promise<ExtensionEntry> {
    const { identity, modes } = result;
    const base = { name: identity.name, file: identity.path, modes };

    if (this.byName.has(identity.name)) {
      this.logger.warn('Extension already registered, ignoring', { extension: identity.name, file: identity.path });
      return { ...base, status: 'duplicate' };
    }

    if (!result.eligible) {
      this.logger.debug('Extension not enabled in the current mode', { extension: identity.name, modes });
      return this.record({ ...base, status: 'disabled' });
    }

    try {
      await withTimeout(
        Promise.resolve().then(() => result.extension.setup(this.host)),
        this.setupTimeoutMs,
        `Extension "${identity.name}" setup()`
      );
    } catch (error) {
      this.logger.error('Failed to set up extension', { extension: identity.name, ...errorMeta(error) });
      return this.record({ ...base, status: 'failed', error: errorMeta(error).error });
    }

    this.logger.info('Extension loaded', { extension: identity.name, modes });
    return this.record({ ...base, status: 'loaded' });
  }

  private record(entry: ExtensionEntry): ExtensionEntry {
    this.byName.set(entry.name, entry);
    return entry;
  }

  private count(status: ExtensionStatus): number {
    return this.entries().filter((entry) => entry.status === status).length;
  }

  /**
   * Snapshot of every recorded extension, in registration order
   */
  entries(): ExtensionEntry[] {
    return Array.from(this.byName.values(), (entry) => ({ ...entry, modes: [...entry.modes] }));
  }

  /**
   * Names of extensions whose setup() succeeded
   */
  loaded(): string[] {
    return this.entries()
      .filter((entry) => entry.status === 'loaded')
      .map((entry) => entry.name);
  }

  clear(): void {
    this.byName.clear();
  }
}
