import { describe, expect, it } from 'vitest';
import { SeenCache } from './seen-cache.js';

describe('SeenCache', () => {
  it('should report keys it already knows', () => {
    const cache = new SeenCache(4);

    expect(cache.add('peer-a/1')).toBe(true);
    expect(cache.add('peer-a/1')).toBe(false);
    expect(cache.has('peer-a/1')).toBe(true);
  });

  it('should evict the oldest key past capacity', () => {
    const cache = new SeenCache(2);
    cache.add('a');
    cache.add('b');
    cache.add('c');

    expect(cache.size).toBe(2);
    expect(cache.has('a')).toBe(false);
    expect(cache.add('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
  });

  it('should reject a capacity below one', () => {
    expect(() => new SeenCache(0)).toThrow('SeenCache capacity must be at least 1');
  });
});
