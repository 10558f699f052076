import { describe, it, expect } from 'vitest';
import { RecordCache } from '../src/services/records/cache';

describe('Record Cache', () => {
  it('should return nothing before a value is stored', () => {
    const cache = new RecordCache<string>(5000, () => 0);
    expect(cache.get()).toBeNull();
    expect(cache.isFresh()).toBe(false);
  });

  it('should keep a value until the TTL elapses', () => {
    let now = 1000;
    const cache = new RecordCache<string>(5000, () => now);
    cache.set('table');

    now = 5999;
    expect(cache.get()).toBe('table');

    now = 6000;
    expect(cache.get()).toBeNull();
  });

  it('should drop the value on invalidation', () => {
    const cache = new RecordCache<string>(5000, () => 0);
    cache.set('table');
    cache.invalidate('test');
    expect(cache.get()).toBeNull();
  });
});
