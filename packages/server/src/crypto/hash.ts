import { createHash, timingSafeEqual } from 'node:crypto';

/**
 * Compare two strings in constant time to prevent timing attacks
 *
 * Both sides are hashed first so the comparison never short-circuits on length.
 */
export function constantTimeCompare(a: string, b: string): boolean {
  const digestA = createHash('sha256').update(a, 'utf8').digest();
  const digestB = createHash('sha256').update(b, 'utf8').digest();

  return timingSafeEqual(digestA, digestB) && a.length === b.length;
}
