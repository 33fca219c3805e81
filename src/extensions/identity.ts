import { isAbsolute, relative, resolve, sep } from 'path';

/**
 * Separator between segments of a qualified extension name
 */
export const NAME_SEPARATOR = '.';

/**
 * Leading character marking a file or directory as private
 */
export const PRIVATE_MARKER = '_';

export interface ExtensionIdentity {
  /** Dotted qualified name, e.g. `bot.plugins.games.dice` */
  readonly name: string;
  /** Absolute path of the source file */
  readonly path: string;
  /** Path relative to the discovery root, `/`-separated */
  readonly relativePath: string;
}

export type IdentityResult =
  | { kind: 'ok'; identity: ExtensionIdentity }
  | { kind: 'private'; name: string }
  | { kind: 'invalid'; reason: string };

export interface IdentityOptions {
  /** Qualified name of the root itself, prefixed to every extension name */
  rootName: string;
  /** Source suffix including the dot, e.g. `.ts` */
  suffix: string;
}

/**
 * Strip the source suffix from the end of a file name
 * @returns The stem, or null if the name does not end with the suffix
 */
export function stripSuffix(fileName: string, suffix: string): string | null {
  if (!fileName.endsWith(suffix)) {
    return null;
  }
  return fileName.slice(0, fileName.length - suffix.length);
}

function isValidSegment(segment: string): boolean {
  return segment.length > 0 && !segment.includes(NAME_SEPARATOR);
}

/**
 * Derive the qualified name of an extension from its path under a root
 *
 * The file's path relative to `root`, with the suffix removed, becomes the
 * dotted name. A segment may not be empty or contain the separator, which
 * keeps names unique per path. Any segment starting with the private marker
 * makes the whole path private.
 *
 * @param root - Discovery root directory
 * @param filePath - Absolute or root-relative path of the candidate
 */
export function resolveIdentity(root: string, filePath: string, options: IdentityOptions): IdentityResult {
  const { rootName, suffix } = options;
  const absoluteRoot = resolve(root);
  const absolutePath = isAbsolute(filePath) ? resolve(filePath) : resolve(absoluteRoot, filePath);
  const relativePath = relative(absoluteRoot, absolutePath);

  if (relativePath === '' || isAbsolute(relativePath) || relativePath.split(sep)[0] === '..') {
    return { kind: 'invalid', reason: 'path is not inside the root' };
  }

  const segments = relativePath.split(sep);
  const fileName = segments.pop() ?? '';
  const stem = stripSuffix(fileName, suffix);

  if (stem === null) {
    return { kind: 'invalid', reason: `file does not end with ${suffix}` };
  }

  segments.push(stem);

  const invalid = segments.find((segment) => !isValidSegment(segment));
  if (invalid !== undefined) {
    return { kind: 'invalid', reason: `"${invalid}" is not a valid name segment` };
  }

  const name = [rootName, ...segments].join(NAME_SEPARATOR);

  if (segments.some((segment) => segment.startsWith(PRIVATE_MARKER))) {
    return { kind: 'private', name };
  }

  return {
    kind: 'ok',
    identity: {
      name,
      path: absolutePath,
      relativePath: segments.slice(0, -1).concat(fileName).join('/'),
    },
  };
}
