import type { NormalizedUrl } from '../../types.js';

/**
 * Collapses equivalent spellings of a page onto one identity.
 *
 * Purely textual: the fragment and query are cut off and trailing slashes removed.
 * Case, percent-encoding and ports are left exactly as written.
 */
export function normalizeUrl(raw: string): NormalizedUrl {
  let url = raw;

  const hashIndex = url.indexOf('#');
  if (hashIndex !== -1) {
    url = url.slice(0, hashIndex);
  }

  const queryIndex = url.indexOf('?');
  if (queryIndex !== -1) {
    url = url.slice(0, queryIndex);
  }

  // Every trailing slash goes, otherwise `a//` would need two passes.
  return url.replace(/\/+$/, '');
}
