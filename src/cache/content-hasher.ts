import { createHash } from 'crypto';

/**
 * Computes the SHA256 hex digest of generated source text, used as the cache key.
 *
 * No normalization: any byte difference in the source must produce a different
 * binary, so whitespace and line endings count.
 */
export function hashSource(source: string): string {
    return createHash('sha256').update(source, 'utf8').digest('hex');
}

const KEY_PATTERN = /^[0-9a-f]{64}$/;

export function isCacheKey(value: string): boolean {
    return KEY_PATTERN.test(value);
}
