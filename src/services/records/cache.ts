import { RECORD_CACHE_TTL_MS } from '../../config/constants';

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Single-slot read cache with a time-to-live.
 * Owned by the loader; writers and reconfiguration call `invalidate()`.
 */
export class RecordCache<T> {
  private entry: CacheEntry<T> | null = null;

  constructor(
    private readonly ttlMs: number = RECORD_CACHE_TTL_MS,
    private readonly now: () => number = Date.now
  ) {}

  get(): T | null {
    if (!this.entry) return null;

    if (this.now() >= this.entry.expiresAt) {
      this.entry = null;
      return null;
    }

    return this.entry.value;
  }

  set(value: T): void {
    this.entry = { value, expiresAt: this.now() + this.ttlMs };
  }

  invalidate(reason: string): void {
    if (this.entry) {
      console.log(`[Cache] Invalidated (${reason})`);
    }
    this.entry = null;
  }

  isFresh(): boolean {
    return this.get() !== null;
  }
}
