import { createHash } from "crypto";
import type { BankruptcyExtraction } from "@shared/schema";

interface CacheEntry<T> {
  data: T;
  timestamp: number;
}

export interface CacheConfig {
  ttlMinutes: number;
  maxEntries: number;
}

/**
 * Cache configuration with environment variable overrides.
 *
 * Environment Variables:
 * - EXTRACTION_CACHE_TTL_MINUTES: how long cached entries remain valid (default: 30)
 * - EXTRACTION_CACHE_MAX_ENTRIES: number of entries kept before eviction (default: 100)
 */
export function getCacheConfig(): CacheConfig {
  const ttlMinutes = parseInt(process.env.EXTRACTION_CACHE_TTL_MINUTES || "30", 10);
  const maxEntries = parseInt(process.env.EXTRACTION_CACHE_MAX_ENTRIES || "100", 10);

  return {
    ttlMinutes: isNaN(ttlMinutes) || ttlMinutes < 1 ? 30 : ttlMinutes,
    maxEntries: isNaN(maxEntries) || maxEntries < 1 ? 100 : maxEntries,
  };
}

/**
 * In-memory cache with TTL expiration, keyed by content hash. Evicts the
 * oldest insertion once full.
 */
export class SimpleCache<T> {
  private cache = new Map<string, CacheEntry<T>>();
  private ttlMs: number;
  private maxEntries: number;

  constructor(config: CacheConfig) {
    this.ttlMs = config.ttlMinutes * 60 * 1000;
    this.maxEntries = config.maxEntries;
  }

  /** SHA-256 of the uploaded bytes. */
  getHash(buffer: Uint8Array): string {
    return createHash("sha256").update(buffer).digest("hex");
  }

  get(hash: string): T | undefined {
    const entry = this.cache.get(hash);
    if (!entry) return undefined;

    if (Date.now() - entry.timestamp > this.ttlMs) {
      this.cache.delete(hash);
      return undefined;
    }

    return entry.data;
  }

  set(hash: string, data: T): void {
    if (!this.cache.has(hash) && this.cache.size >= this.maxEntries) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey !== undefined) {
        this.cache.delete(oldestKey);
      }
    }

    this.cache.delete(hash);
    this.cache.set(hash, { data, timestamp: Date.now() });
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}

export const extractionCache = new SimpleCache<BankruptcyExtraction>(getCacheConfig());
