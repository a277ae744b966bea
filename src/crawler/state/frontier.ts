import type { NormalizedUrl } from '../../types.js';

const COMPACT_THRESHOLD = 32;

/**
 * FIFO of URLs awaiting a worker. The same URL may be queued more than once;
 * duplicates are dropped when a worker claims them against the {@link VisitedSet}.
 */
export class Frontier {
  private queue: NormalizedUrl[] = [];
  private head = 0;

  constructor(seed?: NormalizedUrl) {
    if (seed !== undefined) {
      this.enqueue(seed);
    }
  }

  enqueue(url: NormalizedUrl): void {
    this.queue.push(url);
  }

  /** Never waits: an empty frontier returns `undefined` straight away. */
  dequeue(): NormalizedUrl | undefined {
    if (this.head >= this.queue.length) {
      return undefined;
    }

    const next = this.queue[this.head];
    this.head += 1;

    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }

    return next;
  }

  get pending(): number {
    return this.queue.length - this.head;
  }
}

export class VisitedSet {
  private readonly seen = new Set<NormalizedUrl>();

  /**
   * Check-and-insert in one synchronous step. Returns false when another worker
   * already claimed the URL, in which case the caller must drop it.
   */
  claim(url: NormalizedUrl): boolean {
    if (this.seen.has(url)) {
      return false;
    }

    this.seen.add(url);
    return true;
  }

  has(url: NormalizedUrl): boolean {
    return this.seen.has(url);
  }

  get size(): number {
    return this.seen.size;
  }
}
