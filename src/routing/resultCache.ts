import pLimit from "p-limit";
import { describeError, normalizeQuery, roundTo } from "../utils";
import { CacheEntry, CacheEntryInfo, CacheStatistics, Clock, PersistenceBackend, systemClock } from "./types";

export interface ResultCacheOptions {
  maxEntries?: number;
  defaultTtlSeconds?: number;
  clock?: Clock;
  backend?: PersistenceBackend;
}

export const DEFAULT_MAX_ENTRIES = 500;
export const DEFAULT_TTL_SECONDS = 3600;
const POPULAR_LIMIT = 5;

export function cacheKey(query: string, tool: string): string {
  return `${tool}::${normalizeQuery(query)}`;
}

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export function describeTimeToExpiry(remainingMs: number): string {
  if (remainingMs <= 0) {
    return "Expired";
  }
  const days = Math.floor(remainingMs / DAY_MS);
  const hours = Math.floor((remainingMs % DAY_MS) / HOUR_MS);
  const minutes = Math.floor((remainingMs % HOUR_MS) / MINUTE_MS);
  if (days > 0) {
    return `${days} days ${hours} hours`;
  }
  if (hours > 0) {
    return `${hours} hours ${minutes} minutes`;
  }
  return `${minutes} minutes`;
}

/**
 * Size-bounded TTL cache with least-recently-used eviction.
 *
 * The entry map doubles as the recency list: Map iteration follows insertion
 * order, so a read moves its entry to the tail and the head is always the
 * least recently used entry. Every public operation runs through a single
 * p-limit(1) lock, which keeps hit counters, recency and backend writes of one
 * operation from interleaving with another.
 *
 * When the backend fails to delete, the removal is remembered (a per-key
 * tombstone, or a clear epoch for clearAll) so that read-through never
 * revives a row this cache already dropped.
 */
export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();

  private readonly lock = pLimit(1);

  private readonly maxEntries: number;

  private readonly defaultTtlSeconds: number;

  private readonly clock: Clock;

  private readonly backend: PersistenceBackend | null;

  private readonly tombstones = new Set<string>();

  private clearedAt: number | null = null;

  private readonly writtenSinceClear = new Set<string>();

  private hits = 0;

  private misses = 0;

  constructor({
    maxEntries = DEFAULT_MAX_ENTRIES,
    defaultTtlSeconds = DEFAULT_TTL_SECONDS,
    clock = systemClock,
    backend
  }: ResultCacheOptions = {}) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
    if (!(defaultTtlSeconds > 0)) {
      throw new RangeError(`defaultTtlSeconds must be positive, got ${defaultTtlSeconds}`);
    }
    this.maxEntries = maxEntries;
    this.defaultTtlSeconds = defaultTtlSeconds;
    this.clock = clock;
    this.backend = backend ?? null;
  }

  get size(): number {
    return this.entries.size;
  }

  get(query: string, tool: string): Promise<CacheEntry | null> {
    return this.lock(async () => {
      const key = cacheKey(query, tool);
      const now = this.clock.now();
      let entry = this.entries.get(key) ?? (await this.readThrough(key, now));

      if (entry && this.isExpired(entry, now)) {
        await this.remove(key);
        entry = null;
      }

      if (!entry) {
        this.misses += 1;
        return null;
      }

      entry.hitCount += 1;
      entry.lastAccessed = now;
      this.entries.delete(key);
      this.entries.set(key, entry);
      this.hits += 1;
      await this.writeThrough(entry);
      return { ...entry };
    });
  }

  /**
   * Inserts or replaces an entry. Replacing keeps the entry's recency and hit
   * count; a write is not an access. Resolves false when the persistence
   * backend rejected the write, in which case nothing is cached.
   */
  set(query: string, tool: string, value: string, ttlSeconds = this.defaultTtlSeconds): Promise<boolean> {
    return this.lock(async () => {
      if (!(ttlSeconds > 0)) {
        return false;
      }
      const key = cacheKey(query, tool);
      const now = this.clock.now();
      const existing = this.entries.get(key);

      let entry: CacheEntry;
      if (existing) {
        existing.value = value;
        existing.createdAt = now;
        existing.ttlSeconds = ttlSeconds;
        entry = existing;
      } else {
        if (this.entries.size >= this.maxEntries) {
          await this.evictLeastRecentlyUsed();
        }
        entry = {
          key,
          query: normalizeQuery(query),
          tool,
          value,
          createdAt: now,
          ttlSeconds,
          hitCount: 0,
          lastAccessed: now
        };
        this.entries.set(key, entry);
      }

      if (!this.backend) {
        return true;
      }
      try {
        await this.backend.set({ ...entry });
        this.tombstones.delete(key);
        if (this.clearedAt !== null) {
          this.writtenSinceClear.add(key);
        }
        return true;
      } catch (error) {
        console.warn(`Cache write failed for ${key}, result left uncached: ${describeError(error)}`);
        this.entries.delete(key);
        return false;
      }
    });
  }

  invalidate(query: string, tool: string): Promise<boolean> {
    return this.lock(async () => {
      const key = cacheKey(query, tool);
      const existed = this.entries.has(key);
      await this.remove(key);
      return existed;
    });
  }

  invalidateExpired(): Promise<number> {
    return this.lock(async () => {
      const now = this.clock.now();
      const expired = [...this.entries.values()].filter((entry) => this.isExpired(entry, now));
      for (const entry of expired) {
        await this.remove(entry.key);
      }
      return expired.length;
    });
  }

  clearAll(): Promise<number> {
    return this.lock(async () => {
      const removed = this.entries.size;
      this.entries.clear();
      if (this.backend) {
        this.tombstones.clear();
        this.writtenSinceClear.clear();
        try {
          await this.backend.clear();
          this.clearedAt = null;
        } catch (error) {
          console.warn(`Cache backend clear failed, ignoring rows stored until now: ${describeError(error)}`);
          this.clearedAt = this.clock.now();
        }
      }
      return removed;
    });
  }

  statistics(): Promise<CacheStatistics> {
    return this.lock(async () => {
      const now = this.clock.now();
      const all = [...this.entries.values()];
      const liveEntries = all.filter((entry) => !this.isExpired(entry, now)).length;
      const totalHitCount = all.reduce((sum, entry) => sum + entry.hitCount, 0);
      const lookups = this.hits + this.misses;

      const popular = [...all]
        .sort((a, b) => b.hitCount - a.hitCount)
        .slice(0, POPULAR_LIMIT)
        .map((entry) => ({ query: entry.query, tool: entry.tool, hitCount: entry.hitCount }));

      return {
        totalEntries: all.length,
        liveEntries,
        expiredEntries: all.length - liveEntries,
        averageHitCount: all.length > 0 ? roundTo(totalHitCount / all.length, 2) : 0,
        hits: this.hits,
        misses: this.misses,
        hitRate: lookups > 0 ? roundTo(this.hits / lookups, 4) : 0,
        maxEntries: this.maxEntries,
        popular
      } satisfies CacheStatistics;
    });
  }

  /** Describes an entry without counting a hit or touching its recency. */
  info(query: string, tool: string): Promise<CacheEntryInfo> {
    return this.lock(async () => {
      const key = cacheKey(query, tool);
      const entry = this.entries.get(key) ?? (await this.peek(key));
      if (!entry) {
        return { cached: false };
      }
      const expiresAt = entry.createdAt + entry.ttlSeconds * 1000;
      return {
        cached: true,
        key,
        query: entry.query,
        tool: entry.tool,
        createdAt: entry.createdAt,
        expiresAt,
        hitCount: entry.hitCount,
        lastAccessed: entry.lastAccessed,
        timeToExpiry: describeTimeToExpiry(expiresAt - this.clock.now())
      };
    });
  }

  resetStatistics(): void {
    this.hits = 0;
    this.misses = 0;
  }

  /** Periodically purges expired entries. Returns a function that stops the sweep. */
  startSweep(intervalMs: number): () => void {
    const timer = setInterval(() => {
      this.invalidateExpired()
        .then((removed) => {
          if (removed > 0) {
            console.log(`Cache sweep removed ${removed} expired entries`);
          }
        })
        .catch((error: unknown) => {
          console.error("Cache sweep failed", error);
        });
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now >= entry.createdAt + entry.ttlSeconds * 1000;
  }

  /**
   * The head of the map has the oldest lastAccessed. Entries that share it are
   * contiguous at the head, and among those the oldest createdAt goes first.
   */
  private async evictLeastRecentlyUsed(): Promise<void> {
    let victim: CacheEntry | null = null;
    for (const entry of this.entries.values()) {
      if (!victim) {
        victim = entry;
        continue;
      }
      if (entry.lastAccessed !== victim.lastAccessed) {
        break;
      }
      if (entry.createdAt < victim.createdAt) {
        victim = entry;
      }
    }
    if (victim) {
      await this.remove(victim.key);
    }
  }

  private async remove(key: string): Promise<void> {
    this.entries.delete(key);
    if (!this.backend) {
      return;
    }
    try {
      await this.backend.delete(key);
      this.tombstones.delete(key);
      this.writtenSinceClear.delete(key);
    } catch (error) {
      console.warn(`Cache backend delete failed for ${key}, keeping a tombstone: ${describeError(error)}`);
      this.tombstones.add(key);
    }
  }

  private isDropped(row: CacheEntry): boolean {
    if (this.tombstones.has(row.key)) {
      return true;
    }
    return this.clearedAt !== null && row.createdAt <= this.clearedAt && !this.writtenSinceClear.has(row.key);
  }

  private async peek(key: string): Promise<CacheEntry | null> {
    if (!this.backend) {
      return null;
    }
    try {
      const row = await this.backend.get(key);
      const entry: CacheEntry | null = row ? { ...row, key } : null;
      return entry && !this.isDropped(entry) ? entry : null;
    } catch (error) {
      console.warn(`Cache read failed for ${key}: ${describeError(error)}`);
      return null;
    }
  }

  /** Loads a live backend row into memory. Dropped or expired rows are deleted and never evict anything. */
  private async readThrough(key: string, now: number): Promise<CacheEntry | null> {
    if (!this.backend) {
      return null;
    }
    try {
      const row = await this.backend.get(key);
      if (!row) {
        return null;
      }
      const entry: CacheEntry = { ...row, key };
      if (this.isDropped(entry) || this.isExpired(entry, now)) {
        await this.remove(key);
        return null;
      }
      if (this.entries.size >= this.maxEntries) {
        await this.evictLeastRecentlyUsed();
      }
      this.entries.set(key, entry);
      return entry;
    } catch (error) {
      console.warn(`Cache read failed for ${key}, treating as miss: ${describeError(error)}`);
      return null;
    }
  }

  private async writeThrough(entry: CacheEntry): Promise<void> {
    if (!this.backend) {
      return;
    }
    try {
      await this.backend.set({ ...entry });
    } catch (error) {
      console.warn(`Cache hit-count update failed for ${entry.key}: ${describeError(error)}`);
    }
  }
}
