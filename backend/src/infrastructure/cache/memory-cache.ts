/**
 * In-process cache with absolute and sliding expiration
 *
 * Entries carry a size hint; the sum of hints is bounded by `sizeLimit`.
 * When an insert would overflow the bound the cache compacts itself:
 * expired entries first, then by ascending priority and least recent access.
 */

import { createLogger } from '../logging/logger.js';

const logger = createLogger('memory-cache');

export type CachePriority = 'low' | 'normal' | 'high';

export interface CacheEntryOptions {
  absoluteExpirationMs?: number;
  slidingExpirationMs?: number;
  priority?: CachePriority;
  size?: number;
}

export interface MemoryCacheOptions {
  sizeLimit?: number;
  /** Fraction of `sizeLimit` freed by one compaction */
  compactionPercentage?: number;
}

/** Tracks loads of one key; bumping `generation` voids the results of loads already running */
interface PendingLoad {
  generation: number;
  pending: number;
}

interface CacheEntry<V> {
  value: V;
  absoluteExpiresAt: number | null;
  slidingExpirationMs: number | null;
  lastAccessedAt: number;
  priority: CachePriority;
  size: number;
}

const PRIORITY_RANK: Record<CachePriority, number> = {
  low: 0,
  normal: 1,
  high: 2,
};

export class MemoryCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly loads = new Map<string, PendingLoad>();
  private readonly sizeLimit: number;
  private readonly compactionPercentage: number;
  private currentSize = 0;

  constructor(options: MemoryCacheOptions = {}) {
    this.sizeLimit = options.sizeLimit ?? 1000;
    this.compactionPercentage = options.compactionPercentage ?? 0.25;
  }

  /** Sum of the size hints of live entries */
  get size(): number {
    return this.currentSize;
  }

  get count(): number {
    return this.entries.size;
  }

  /** Keys with a factory still running */
  get loadingCount(): number {
    return this.loads.size;
  }

  /**
   * Return the cached value for `key`, renewing its sliding window,
   * or run `factory` and store its result.
   * `options` may depend on the loaded value.
   * A factory failure propagates and stores nothing.
   */
  async getOrCreate(
    key: string,
    factory: () => Promise<V>,
    options: CacheEntryOptions | ((value: V) => CacheEntryOptions) = {}
  ): Promise<V> {
    const entry = this.touch(key);
    if (entry) {
      logger.debug({ key }, 'Cache HIT');
      return entry.value;
    }

    logger.debug({ key }, 'Cache MISS');
    const load = this.loads.get(key) ?? { generation: 0, pending: 0 };
    this.loads.set(key, load);
    load.pending++;
    const generation = load.generation;

    let value: V;
    try {
      value = await factory();
    } finally {
      load.pending--;
      if (load.pending === 0) {
        this.loads.delete(key);
      }
    }

    // A removal while the factory ran means the value may already be stale
    if (load.generation === generation) {
      this.set(key, value, typeof options === 'function' ? options(value) : options);
    } else {
      logger.debug({ key }, 'Skipped storing value invalidated during load');
    }
    return value;
  }

  /** Read without renewing the sliding window */
  peek(key: string): V | undefined {
    const entry = this.liveEntry(key, Date.now());
    return entry?.value;
  }

  has(key: string): boolean {
    return this.liveEntry(key, Date.now()) !== undefined;
  }

  set(key: string, value: V, options: CacheEntryOptions = {}): void {
    const now = Date.now();
    const size = options.size ?? 1;

    if (size > this.sizeLimit) {
      logger.warn({ key, size, sizeLimit: this.sizeLimit }, 'Entry larger than cache size limit, not stored');
      return;
    }

    this.deleteEntry(key);

    if (this.currentSize + size > this.sizeLimit) {
      this.compact(now, size);
    }

    this.entries.set(key, {
      value,
      absoluteExpiresAt:
        options.absoluteExpirationMs !== undefined ? now + options.absoluteExpirationMs : null,
      slidingExpirationMs: options.slidingExpirationMs ?? null,
      lastAccessedAt: now,
      priority: options.priority ?? 'normal',
      size,
    });
    this.currentSize += size;
  }

  remove(key: string): boolean {
    const load = this.loads.get(key);
    if (load) {
      load.generation++;
    }
    return this.deleteEntry(key);
  }

  clear(): void {
    for (const load of this.loads.values()) {
      load.generation++;
    }
    this.entries.clear();
    this.currentSize = 0;
  }

  private expiresAt(entry: CacheEntry<V>): number {
    const sliding =
      entry.slidingExpirationMs !== null
        ? entry.lastAccessedAt + entry.slidingExpirationMs
        : Number.POSITIVE_INFINITY;
    const absolute = entry.absoluteExpiresAt ?? Number.POSITIVE_INFINITY;
    return Math.min(sliding, absolute);
  }

  private liveEntry(key: string, now: number): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (now >= this.expiresAt(entry)) {
      this.deleteEntry(key);
      return undefined;
    }
    return entry;
  }

  private touch(key: string): CacheEntry<V> | undefined {
    const now = Date.now();
    const entry = this.liveEntry(key, now);
    if (entry) {
      entry.lastAccessedAt = now;
    }
    return entry;
  }

  private deleteEntry(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    this.entries.delete(key);
    this.currentSize -= entry.size;
    return true;
  }

  private compact(now: number, incomingSize: number): void {
    const target = Math.max(
      Math.ceil(this.sizeLimit * this.compactionPercentage),
      this.currentSize + incomingSize - this.sizeLimit
    );
    let freed = 0;
    let evicted = 0;

    for (const [key, entry] of this.entries) {
      if (now >= this.expiresAt(entry)) {
        freed += entry.size;
        evicted++;
        this.deleteEntry(key);
      }
    }

    if (freed < target) {
      const candidates = [...this.entries.entries()].sort(
        ([, a], [, b]) =>
          PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] || a.lastAccessedAt - b.lastAccessedAt
      );
      for (const [key, entry] of candidates) {
        if (freed >= target) {
          break;
        }
        freed += entry.size;
        evicted++;
        this.deleteEntry(key);
      }
    }

    logger.debug({ freed, evicted, remaining: this.entries.size }, 'Cache compacted');
  }
}
