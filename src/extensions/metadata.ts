import { z } from 'zod';
import { Mode, isModeMask, type ModeMask } from './modes.js';
import type { Logger } from '../utils/logger.js';

/**
 * Name of the export an extension uses to declare its metadata
 */
export const METADATA_EXPORT = 'metadata';

/**
 * Metadata schema
 *
 * `loadIfMode` is the set of modes the extension may be activated in.
 */
export const ExtensionMetadataSchema = z.object({
  loadIfMode: z
    .number()
    .refine(isModeMask, 'loadIfMode must be a combination of Mode flags')
    .default(Mode.PRODUCTION),
});

export interface ExtensionMetadata {
  readonly loadIfMode: ModeMask;
}

/**
 * Metadata assumed for extensions that declare none
 */
export const DEFAULT_METADATA: ExtensionMetadata = Object.freeze({ loadIfMode: Mode.PRODUCTION });

/**
 * Helper for extension authors
 *
 * ```typescript
 * export const metadata = defineMetadata({ loadIfMode: Mode.DEVELOPMENT });
 * ```
 */
export function defineMetadata(metadata: Partial<ExtensionMetadata> = {}): ExtensionMetadata {
  return Object.freeze({ ...DEFAULT_METADATA, ...metadata });
}

/**
 * Raised when an extension exports metadata that does not match the schema
 */
export class InvalidMetadataError extends Error {
  readonly issues: string[];

  constructor(extension: string, issues: string[]) {
    super(`Invalid metadata in ${extension}: ${issues.join('; ')}`);
    this.name = 'InvalidMetadataError';
    this.issues = issues;
  }
}

/**
 * Read an extension's declared metadata
 *
 * Falls back to {@link DEFAULT_METADATA} when the module has no `metadata`
 * export, logging that the default was assumed.
 *
 * @param module - Exports of the loaded extension
 * @param extension - Qualified name, for messages
 * @throws InvalidMetadataError if `metadata` is present but malformed
 */
export function resolveMetadata(
  module: Readonly<Record<string, unknown>>,
  extension: string,
  logger: Logger
): ExtensionMetadata {
  const declared = module[METADATA_EXPORT];

  if (declared === undefined) {
    logger.info('Extension has no metadata export, assuming production only', { extension });
    return DEFAULT_METADATA;
  }

  const result = ExtensionMetadataSchema.safeParse(declared);
  if (!result.success) {
    throw new InvalidMetadataError(
      extension,
      result.error.errors.map((e) => (e.path.length ? `${e.path.join('.')}: ${e.message}` : e.message))
    );
  }

  return Object.freeze({ loadIfMode: result.data.loadIfMode });
}
