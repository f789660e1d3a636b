import { silentLogger, type Logger } from './logger.js';

export interface CacheEntry<TValue> {
  value: TValue;
  storedAt: number;
}

export interface CacheStats {
  totalEntries: number;
  activeEntries: number;
  expiredCleaned: number;
  ttlSeconds: number;
}

export interface ResponseCacheOptions {
  ttlMinutes: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * In-memory response cache with a single process-wide TTL.
 *
 * Expiry is checked lazily on `get`; `startSweep` only frees memory earlier.
 * `get` and `put` never suspend, so on Node's single event loop each call is
 * atomic with respect to every concurrent tool invocation.
 *
 * There is no single-flight: two concurrent misses for the same key both run
 * their fetch and the later `put` wins. A per-key map of in-flight promises in
 * `getOrFetch` is the place to add coalescing if that ever matters.
 */
export class ResponseCache<TValue> {
  readonly ttlMs: number;
  private readonly entries = new Map<string, CacheEntry<TValue>>();
  private readonly now: () => number;
  private readonly logger: Logger;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: ResponseCacheOptions) {
    if (!(options.ttlMinutes > 0)) {
      throw new RangeError(`ttlMinutes must be positive, got ${options.ttlMinutes}`);
    }
    this.ttlMs = options.ttlMinutes * 60_000;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? silentLogger;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): TValue | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  put(key: string, value: TValue): void {
    this.entries.set(key, { value, storedAt: this.now() });
  }

  /**
   * Returns the fresh cached value for `key`, or awaits `fetchFn`, stores its
   * result and returns it. A rejected fetch stores nothing and its error
   * reaches the caller as-is.
   */
  async getOrFetch(key: string, fetchFn: () => Promise<TValue>): Promise<TValue> {
    const cached = this.get(key);
    if (cached !== undefined) {
      this.logger.info(`Cache hit for: ${key}`);
      return cached;
    }

    const value = await fetchFn();
    this.put(key, value);
    this.logger.debug(`Cached response for: ${key}`);
    return value;
  }

  clear(): void {
    this.entries.clear();
  }

  cleanupExpired(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  stats(): CacheStats {
    const totalEntries = this.entries.size;
    const expiredCleaned = this.cleanupExpired();
    return {
      totalEntries,
      activeEntries: this.entries.size,
      expiredCleaned,
      ttlSeconds: this.ttlMs / 1000
    };
  }

  startSweep(intervalMs: number): void {
    this.stopSweep();
    this.sweepTimer = setInterval(() => {
      const removed = this.cleanupExpired();
      if (removed > 0) {
        this.logger.debug(`Swept ${removed} expired cache entries`);
      }
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  dispose(): void {
    this.stopSweep();
    this.clear();
  }

  private isExpired(entry: CacheEntry<TValue>): boolean {
    return this.now() - entry.storedAt > this.ttlMs;
  }
}
