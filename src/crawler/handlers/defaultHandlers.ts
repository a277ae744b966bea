import { getLogger } from '../../logger.js';
import type { CrawlHandlers } from '../../types.js';
import { writeProgress } from '../../util/output.js';

export function createDefaultHandlers(): CrawlHandlers {
  return {
    onProgress: (url, visitedCount) => writeProgress(url, visitedCount),
    // Per-page failures are only visible with debug logging enabled.
    onDiscard: (url, reason) => getLogger().debug({ url, reason }, 'page discarded'),
  };
}
