import { describe, expect, it } from 'vitest';

import { Frontier, VisitedSet } from '../src/crawler/state/frontier.js';

describe('Frontier', () => {
  it('starts with the seed queued', () => {
    const frontier = new Frontier('https://x.io');

    expect(frontier.pending).toBe(1);
    expect(frontier.dequeue()).toBe('https://x.io');
    expect(frontier.dequeue()).toBeUndefined();
  });

  it('keeps FIFO order and allows the same URL more than once', () => {
    const frontier = new Frontier();
    frontier.enqueue('https://x.io/a');
    frontier.enqueue('https://x.io/b');
    frontier.enqueue('https://x.io/a');

    expect(frontier.pending).toBe(3);
    expect([frontier.dequeue(), frontier.dequeue(), frontier.dequeue()]).toEqual([
      'https://x.io/a',
      'https://x.io/b',
      'https://x.io/a',
    ]);
    expect(frontier.pending).toBe(0);
  });

  it('stays consistent across internal compaction', () => {
    const frontier = new Frontier();
    for (let index = 0; index < 100; index += 1) {
      frontier.enqueue(`https://x.io/${index}`);
    }

    for (let index = 0; index < 70; index += 1) {
      expect(frontier.dequeue()).toBe(`https://x.io/${index}`);
    }

    frontier.enqueue('https://x.io/late');
    expect(frontier.pending).toBe(31);
    expect(frontier.dequeue()).toBe('https://x.io/70');
  });
});

describe('VisitedSet', () => {
  it('grants a claim only once per URL', () => {
    const visited = new VisitedSet();

    expect(visited.claim('https://x.io/a')).toBe(true);
    expect(visited.claim('https://x.io/a')).toBe(false);
    expect(visited.has('https://x.io/a')).toBe(true);
    expect(visited.has('https://x.io/b')).toBe(false);
    expect(visited.size).toBe(1);
  });
});
