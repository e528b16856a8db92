import { describe, it, expect, vi } from 'vitest';
import { ExtractionStrategy, dedupeBy, runCascade } from '../cascade.js';

interface Item {
  url: string;
  name: string;
}

type Strategy = ExtractionStrategy<string, Item>;

function returning(name: string, items: Item[]): Strategy {
  return { name, extract: vi.fn(async (): Promise<Item[]> => items) };
}

describe('runCascade', () => {
  it('stops at the first strategy with results', async () => {
    const first = returning('first', [{ url: 'https://a.example/1', name: 'One' }]);
    const second = returning('second', [{ url: 'https://a.example/2', name: 'Two' }]);

    const result = await runCascade([first, second], '<html></html>');

    expect(result.items).toEqual([{ url: 'https://a.example/1', name: 'One' }]);
    expect(result.strategy).toBe('first');
    expect(result.attempted).toEqual(['first']);
    expect(second.extract).not.toHaveBeenCalled();
  });

  it('falls through empty, failing and unavailable strategies', async () => {
    const offline: Strategy = {
      name: 'offline',
      isAvailable: async () => false,
      extract: vi.fn(async (): Promise<Item[]> => [{ url: 'https://a.example/x', name: 'X' }]),
    };
    const broken: Strategy = {
      name: 'broken',
      extract: async () => {
        throw new Error('boom');
      },
    };
    const empty = returning('empty', []);
    const winner = returning('winner', [
      { url: 'https://a.example/1', name: 'One' },
      { url: 'https://a.example/1', name: 'Duplicate' },
      { url: 'https://a.example/2', name: 'Two' },
    ]);
    const later = returning('later', [{ url: 'https://a.example/3', name: 'Three' }]);

    const result = await runCascade([offline, broken, empty, winner, later], '', { label: 'courses' });

    expect(offline.extract).not.toHaveBeenCalled();
    expect(later.extract).not.toHaveBeenCalled();
    expect(result.strategy).toBe('winner');
    expect(result.attempted).toEqual(['broken', 'empty', 'winner']);
    expect(result.failures).toEqual(['Strategy broken (courses) failed: boom']);
    expect(result.items).toEqual([
      { url: 'https://a.example/1', name: 'One' },
      { url: 'https://a.example/2', name: 'Two' },
    ]);
  });

  it('treats a strategy that exceeds the timeout as empty', async () => {
    const slow: Strategy = { name: 'slow', extract: () => new Promise<Item[]>(() => undefined) };
    const fallback = returning('fallback', [{ url: 'https://a.example/1', name: 'One' }]);

    const result = await runCascade([slow, fallback], '', { timeoutMs: 20 });

    expect(result.failures).toEqual(['Strategy slow failed: Strategy slow timed out after 20ms']);
    expect(result.strategy).toBe('fallback');
  });

  it('skips a strategy whose availability check throws', async () => {
    const flaky: Strategy = {
      name: 'flaky',
      isAvailable: async () => {
        throw new Error('unreachable');
      },
      extract: vi.fn(async (): Promise<Item[]> => []),
    };

    const result = await runCascade([flaky], '');

    expect(flaky.extract).not.toHaveBeenCalled();
    expect(result).toEqual({ items: [], strategy: null, attempted: [], failures: [] });
  });

  it('returns an empty result when every strategy comes back empty', async () => {
    const result = await runCascade([returning('a', []), returning('b', [])], '');
    expect(result).toEqual({ items: [], strategy: null, attempted: ['a', 'b'], failures: [] });
  });
});

describe('dedupeBy', () => {
  it('keeps the first item per key in order', () => {
    expect(dedupeBy([3, 1, 3, 2, 1], (n) => String(n))).toEqual([3, 1, 2]);
  });
});
