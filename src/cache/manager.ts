import type { LRUCache } from "lru-cache";
import type { z } from "zod";
import { appConfig } from "../config.js";
import { logEvent } from "../telemetry.js";
import { DiskCacheTier, type StoredCacheEntry } from "./disk.js";
import { cacheKey, type CacheParams } from "./key.js";
import { createLRUCache } from "./lru.js";

export type TwoTierCacheOptions = {
  /** Tier-2 directory; defaults to `CACHE_DIR`. */
  directory?: string;
  /** Pass `false` to keep entries in memory only. */
  persist?: boolean;
  maxEntries?: number;
  now?: () => number;
};

export interface CacheStats {
  memoryEntries: number;
  hits: number;
  misses: number;
  evictions: number;
}

type EntrySchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Namespaced key/value cache with an in-process LRU tier in front of a
 * durable file tier. Every entry carries its own TTL; an expired or
 * unreadable entry is reported as absent and removed from both tiers.
 */
export class TwoTierCache {
  private readonly memory: LRUCache<string, StoredCacheEntry>;
  private readonly disk: DiskCacheTier | null;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: TwoTierCacheOptions = {}) {
    this.memory = createLRUCache<string, StoredCacheEntry>(
      options.maxEntries ?? appConfig.cache.maxEntries,
    );
    const persist = options.persist ?? appConfig.cache.persist;
    this.disk = persist
      ? new DiskCacheTier(options.directory ?? appConfig.cache.directory)
      : null;
    this.now = options.now ?? Date.now;
  }

  get persistent(): boolean {
    return this.disk !== null;
  }

  async get<T>(namespace: string, params: CacheParams, schema: EntrySchema<T>): Promise<T | null> {
    const key = cacheKey(namespace, params);

    const fromMemory = this.memory.get(key);
    if (fromMemory) {
      const value = await this.accept(key, fromMemory, schema);
      if (value !== null) {
        this.hits += 1;
        return value;
      }
      this.misses += 1;
      return null;
    }

    if (!this.disk) {
      this.misses += 1;
      return null;
    }

    const result = await this.disk.read(key);
    if (result.status === "miss") {
      this.misses += 1;
      return null;
    }
    if (result.status === "corrupt") {
      await this.evict(key, namespace, "corrupt", result.reason);
      this.misses += 1;
      return null;
    }

    const value = await this.accept(key, result.entry, schema);
    if (value === null) {
      this.misses += 1;
      return null;
    }
    this.memory.set(key, result.entry);
    this.hits += 1;
    return value;
  }

  async set<T>(namespace: string, params: CacheParams, value: T, ttlSeconds: number): Promise<void> {
    if (value === undefined) {
      throw new TypeError(`cannot cache undefined under namespace '${namespace}'`);
    }
    const key = cacheKey(namespace, params);
    const entry: StoredCacheEntry = {
      namespace,
      params,
      data: structuredClone(value),
      cachedAt: new Date(this.now()).toISOString(),
      ttlSeconds,
    };
    this.memory.set(key, entry);
    if (this.disk) {
      await this.disk.write(key, entry);
    }
  }

  async invalidate(namespace: string, params: CacheParams): Promise<void> {
    const key = cacheKey(namespace, params);
    this.memory.delete(key);
    if (this.disk) {
      await this.disk.remove(key);
    }
  }

  /** Empties both tiers, including entries written by other instances. */
  async clear(): Promise<void> {
    this.memory.clear();
    if (this.disk) {
      await this.disk.clear();
    }
  }

  /** Drops the in-process tier. The durable tier is left for other instances. */
  dispose(): void {
    this.memory.clear();
  }

  stats(): CacheStats {
    return {
      memoryEntries: this.memory.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private async accept<T>(
    key: string,
    entry: StoredCacheEntry,
    schema: EntrySchema<T>,
  ): Promise<T | null> {
    const cachedAt = Date.parse(entry.cachedAt);
    if (Number.isNaN(cachedAt)) {
      await this.evict(key, entry.namespace, "corrupt", "unreadable cachedAt");
      return null;
    }

    const ageMs = this.now() - cachedAt;
    if (ageMs > entry.ttlSeconds * 1000) {
      await this.evict(key, entry.namespace, "expired", `age ${Math.round(ageMs / 1000)}s`);
      return null;
    }

    const parsed = schema.safeParse(entry.data);
    if (!parsed.success) {
      await this.evict(
        key,
        entry.namespace,
        "corrupt",
        parsed.error.issues[0]?.message ?? "schema mismatch",
      );
      return null;
    }
    return parsed.data;
  }

  private async evict(
    key: string,
    namespace: string,
    reason: "expired" | "corrupt",
    detail: string,
  ): Promise<void> {
    this.evictions += 1;
    logEvent(reason === "corrupt" ? "warn" : "debug", `cache.${reason}`, {
      namespace,
      key,
      detail,
    });
    this.memory.delete(key);
    if (this.disk) {
      await this.disk.remove(key);
    }
  }
}
