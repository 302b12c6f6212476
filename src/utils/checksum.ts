/**
 * SHA-256 helpers for managed-block trailers and snapshot manifests.
 */
import { createHash } from 'node:crypto';

/**
 * Compute a short SHA-256 checksum of the given content.
 * Returns the first 16 characters of the hex digest; used in source-hash trailers.
 */
export function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

/**
 * Full SHA-256 hex digest of raw bytes or text.
 */
export function hashContent(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}
