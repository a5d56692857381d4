import { createHash, timingSafeEqual } from 'node:crypto';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/** Constant-time key check; both sides are hashed first so length differences do not leak. */
export function apiKeyMatches(candidate: string | undefined, expected: string): boolean {
  if (candidate === undefined || expected.length === 0) {
    return false;
  }

  return timingSafeEqual(digest(candidate), digest(expected));
}
