export type DiscoveryErrorCode = 'ROOT_NOT_FOUND' | 'ROOT_NOT_DIRECTORY' | 'ROOT_UNREADABLE';

/**
 * Failure of the discovery run itself, as opposed to one extension
 *
 * Raised before any candidate is visited.
 */
export class DiscoveryError extends Error {
  readonly code: DiscoveryErrorCode;
  readonly root: string;

  constructor(code: DiscoveryErrorCode, root: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DiscoveryError';
    this.code = code;
    this.root = root;
  }
}
