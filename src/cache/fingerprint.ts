import { createHash } from 'crypto';

const FINGERPRINT_LENGTH = 16;

/**
 * Deterministic cache key for a request. The query is lower-cased and
 * trimmed, so requests differing only in case or surrounding whitespace
 * share a key. Scope is used verbatim; the pair is JSON-encoded so no
 * scope/query split can collide with another.
 */
export function fingerprint(query: string, scope: string): string {
  const normalized = query.toLowerCase().trim();
  return createHash('md5').update(JSON.stringify([scope, normalized])).digest('hex').slice(0, FINGERPRINT_LENGTH);
}
