import type { ChangeSet, NormalizedUrl } from '../types.js';

export interface ChangesDocument {
  new_urls: NormalizedUrl[];
  removed_urls: NormalizedUrl[];
  updated_urls: NormalizedUrl[];
  url_count_change: number;
}

/**
 * Set algebra over two URL sets. "Updated" means present in both runs; page content is
 * never compared. Lists are sorted so repeated runs produce identical files.
 */
export function computeChangeSet(
  previous: Iterable<NormalizedUrl>,
  current: Iterable<NormalizedUrl>,
): ChangeSet {
  const previousUrls = new Set(previous);
  const currentUrls = new Set(current);

  const newUrls = [...currentUrls].filter((url) => !previousUrls.has(url)).sort();
  const removedUrls = [...previousUrls].filter((url) => !currentUrls.has(url)).sort();
  const updatedUrls = [...currentUrls].filter((url) => previousUrls.has(url)).sort();

  return {
    newUrls,
    removedUrls,
    updatedUrls,
    countDelta: currentUrls.size - previousUrls.size,
  };
}

export function toChangesDocument(changes: ChangeSet): ChangesDocument {
  return {
    new_urls: changes.newUrls,
    removed_urls: changes.removedUrls,
    updated_urls: changes.updatedUrls,
    url_count_change: changes.countDelta,
  };
}
