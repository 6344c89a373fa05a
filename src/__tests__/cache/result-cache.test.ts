import { describe, it, expect } from 'vitest';
import { ResultCache, buildCacheKey } from '../../services/cache/result-cache.js';
import { FakeClock, identity } from '../helpers/fakes.js';

describe('ResultCache', () => {
  it('returns a stored value until the TTL elapses', () => {
    const clock = new FakeClock(1_000);
    const cache = new ResultCache<number>(300, clock);
    cache.set('k', 42);

    clock.advance(299_999);
    expect(cache.get('k')).toBe(42);

    clock.advance(1);
    expect(cache.get('k')).toBeNull();
  });

  it('removes expired entries on read', () => {
    const clock = new FakeClock();
    const cache = new ResultCache<string>(1, clock);
    cache.set('a', 'x');
    cache.set('b', 'y');
    clock.advance(1_000);

    expect(cache.get('a')).toBeNull();
    expect(cache.size()).toBe(1);
  });

  it('sweeps expired entries that are never read again', () => {
    const clock = new FakeClock();
    const cache = new ResultCache<number>(1, clock);

    for (let i = 0; i < 1_000; i++) {
      cache.set(`k${i}`, i);
      clock.advance(10);
    }

    // Last sweep at k900 keeps k801..k899; k900..k999 were added after it
    expect(cache.size()).toBe(199);
    expect(cache.get('k999')).toBe(999);
  });

  it('overwrites an existing key and restarts its TTL', () => {
    const clock = new FakeClock();
    const cache = new ResultCache<number>(10, clock);
    cache.set('k', 1);
    clock.advance(9_000);
    cache.set('k', 2);
    clock.advance(9_000);

    expect(cache.get('k')).toBe(2);
  });
});

describe('buildCacheKey', () => {
  it('ignores variant order', () => {
    const a = identity({ name: 'Charizard', variants: ['holo', 'first-edition'] });
    const b = identity({ name: 'Charizard', variants: ['first-edition', 'holo'] });
    expect(buildCacheKey(a)).toBe(buildCacheKey(b));
  });

  it('distinguishes identities that differ only by card number', () => {
    const a = identity({ name: 'Pikachu', cardNumber: '58/102' });
    const b = identity({ name: 'Pikachu', cardNumber: '60/64' });
    expect(buildCacheKey(a)).not.toBe(buildCacheKey(b));
  });
});
