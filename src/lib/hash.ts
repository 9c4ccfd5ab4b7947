/**
 * Hash Utilities
 *
 * Provides SHA256 digests for generated settings.
 */

import { createHash } from 'node:crypto';

/**
 * Compute a short hash of string content.
 *
 * @param content - String content to hash
 * @returns First 8 characters of SHA256 hash
 */
export function computeContentHash(content: string): string {
  const hash = createHash('sha256').update(content).digest('hex');
  return hash.slice(0, 8);
}
