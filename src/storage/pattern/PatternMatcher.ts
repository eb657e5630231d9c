export const MATCH_ALL = '*';

/**
 * Single-wildcard key matching.
 *
 * "*" matches every key and a pattern without "*" must equal the key.
 * Otherwise the pattern is split at its first "*": the key must start with
 * the prefix and end with the suffix. Any further "*" is a literal suffix
 * character. Prefix and suffix may overlap, so "ab" matches "ab*b".
 */
export function matchesPattern(key: string, pattern: string): boolean {
  if (pattern === MATCH_ALL) {
    return true;
  }

  const star = pattern.indexOf('*');
  if (star === -1) {
    return key === pattern;
  }

  const prefix = pattern.slice(0, star);
  const suffix = pattern.slice(star + 1);
  return key.startsWith(prefix) && key.endsWith(suffix);
}
