// Response cache for raw TMDB payloads.
// Entries are advisory: a miss or an eviction only costs a provider round trip.

import type { TimeWindow } from "./tmdb.js"

export interface ResponseCache {
  /** The cached payload, or null on a miss. */
  get(key: string): Promise<unknown>
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>
}

interface CacheEntry {
  value: unknown
  expiresAt: number
}

/**
 * In-process cache with TTL support.
 * Note: This resets when the process restarts and is not shared between instances.
 */
export class MemoryResponseCache implements ResponseCache {
  private cache = new Map<string, CacheEntry>()
  private cleanupInterval: NodeJS.Timeout

  constructor(cleanupIntervalMs = 5 * 60 * 1000) {
    this.cleanupInterval = setInterval(() => this.cleanup(), cleanupIntervalMs)
    this.cleanupInterval.unref()
  }

  async get(key: string): Promise<unknown> {
    const entry = this.cache.get(key)

    if (!entry) {
      return null
    }

    if (Date.now() >= entry.expiresAt) {
      this.cache.delete(key)
      return null
    }

    return entry.value
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.cache.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    })
  }

  get size(): number {
    return this.cache.size
  }

  cleanup(): void {
    const now = Date.now()
    for (const [key, entry] of this.cache.entries()) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key)
      }
    }
  }

  // For graceful shutdown
  destroy(): void {
    clearInterval(this.cleanupInterval)
    this.cache.clear()
  }
}

// Search results go stale quickly, so they get a fixed short TTL
export const SEARCH_CACHE_TTL_SECONDS = 60 * 30

/**
 * Lower-case, trim and collapse inner whitespace so equivalent queries share a key.
 */
export function normalizeSearchQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, " ")
}

export const CACHE_KEYS = {
  genres: () => "tmdb:genres",
  trending: (window: TimeWindow, page: number) => `tmdb:trending:${window}:${page}`,
  popular: (page: number) => `tmdb:popular:${page}`,
  movieDetails: (tmdbId: number) => `tmdb:movie:${tmdbId}`,
  search: (query: string, page: number) => `tmdb:search:${normalizeSearchQuery(query)}:${page}`,
}

/**
 * Serve from cache, or run fetchFn and cache what it returns.
 * A null result (failed fetch) is passed through and never cached.
 */
export async function getCachedOrFetch(
  cache: ResponseCache,
  key: string,
  ttlSeconds: number,
  fetchFn: () => Promise<unknown>
): Promise<unknown> {
  const cached = await cache.get(key)
  if (cached !== null) {
    return cached
  }

  const fresh = await fetchFn()
  if (fresh !== null) {
    await cache.set(key, fresh, ttlSeconds)
  }
  return fresh
}
