import { createJiti } from 'jiti';
import type { ExtensionIdentity } from './identity.js';
import { errorMeta, type Logger } from '../utils/logger.js';

/**
 * Exports of a loaded extension source file
 */
export type ExtensionModule = Readonly<Record<string, unknown>>;

export type LoadResult =
  | { loaded: true; module: ExtensionModule }
  | { loaded: false; error: unknown };

/**
 * Imports a source file and resolves to its module namespace
 */
export type ModuleImporter = (path: string) => Promise<unknown>;

/**
 * Create a jiti instance for dynamic TypeScript imports
 *
 * Module and transform caches are off so every load evaluates the file into
 * a fresh namespace, and repeated discovery runs see the file as it is on
 * disk now.
 */
const jiti = createJiti(import.meta.url, {
  moduleCache: false,
  fsCache: false,
  interopDefault: false,
});

/**
 * Default importer: jiti, so extensions can be written in TypeScript without
 * pre-compilation
 */
export const jitiImporter: ModuleImporter = (path) => jiti.import(path);

function isRecord(value: unknown): value is Record<string, unknown> {
  return (typeof value === 'object' || typeof value === 'function') && value !== null;
}

/**
 * Load a single extension source file
 *
 * Never throws: syntax errors, exceptions raised while the module body runs
 * and unresolved imports are logged with the extension's name and stack and
 * reported as `{ loaded: false }`.
 */
export async function loadExtensionModule(
  identity: ExtensionIdentity,
  logger: Logger,
  importer: ModuleImporter = jitiImporter
): Promise<LoadResult> {
  let imported: unknown;

  try {
    imported = await importer(identity.path);
  } catch (error) {
    logger.error('Failed to import extension, it is not considered installed', {
      extension: identity.name,
      file: identity.path,
      ...errorMeta(error),
    });
    return { loaded: false, error };
  }

  if (!isRecord(imported)) {
    const error = new Error(`Module namespace of ${identity.name} is not an object`);
    logger.error('Failed to import extension, it is not considered installed', {
      extension: identity.name,
      file: identity.path,
      ...errorMeta(error),
    });
    return { loaded: false, error };
  }

  return { loaded: true, module: imported };
}
