/**
 * Redis client for the shared response cache.
 * Gracefully degrades to no-cache behavior if Redis is unavailable.
 */
import { Redis } from "ioredis"
import type { ResponseCache } from "./cache.js"
import { logger } from "./logger.js"

let redisClient: Redis | null = null
let isConnected = false

function createClient(url: string): Redis {
  const client = new Redis(url, {
    maxRetriesPerRequest: 1,
    retryStrategy: (times) => {
      if (times > 3) {
        logger.warn("Redis connection failed after 3 retries, giving up")
        return null
      }
      return Math.min(times * 100, 1000)
    },
    lazyConnect: true,
  })

  client.on("ready", () => {
    isConnected = true
    logger.info("Redis ready")
  })

  client.on("error", (err: Error) => {
    logger.warn({ err: err.message }, "Redis error")
  })

  client.on("close", () => {
    isConnected = false
    logger.info("Redis connection closed")
  })

  client.on("reconnecting", () => {
    logger.info("Redis reconnecting...")
  })

  return client
}

/**
 * Get the Redis client.
 * Returns null if Redis was never initialized or is currently disconnected.
 */
export function getRedisClient(): Redis | null {
  return isConnected ? redisClient : null
}

/**
 * Check if Redis is available for caching.
 */
export function isRedisAvailable(): boolean {
  return isConnected && redisClient !== null
}

/**
 * Initialize Redis connection (call during app startup).
 * Returns true if Redis is available, false otherwise.
 */
export async function initRedis(url: string | undefined): Promise<boolean> {
  if (!url) {
    logger.info("REDIS_URL not set - using in-memory response cache")
    return false
  }

  if (!redisClient) {
    redisClient = createClient(url)
  }

  try {
    await redisClient.connect()
    await redisClient.ping()
    isConnected = true
    logger.info("Redis connection verified")
    return true
  } catch (err) {
    logger.warn(
      { err: err instanceof Error ? err.message : String(err) },
      "Redis not available - using in-memory response cache"
    )
    return false
  }
}

/**
 * Gracefully close Redis connection.
 */
export async function closeRedis(): Promise<void> {
  if (redisClient) {
    try {
      await redisClient.quit()
    } catch (err) {
      logger.warn({ err }, "Error closing Redis connection")
    }
    redisClient = null
    isConnected = false
  }
}

// For testing: reset the module state
export function _resetForTesting(): void {
  if (redisClient) {
    redisClient.disconnect()
  }
  redisClient = null
  isConnected = false
}

// ============================================================================
// Response cache
// ============================================================================

/** The two commands the response cache needs. */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>
  set(key: string, value: string, secondsToken: "EX", seconds: number): Promise<unknown>
}

const CACHE_PREFIX = "reel:"

/**
 * Response cache backed by Redis. Values are stored as JSON with a native
 * expiry. Redis errors and undecodable values count as misses, and a failed
 * write is logged and dropped.
 */
export class RedisResponseCache implements ResponseCache {
  constructor(
    private readonly getClient: () => RedisCacheClient | null = getRedisClient,
    private readonly prefix = CACHE_PREFIX
  ) {}

  async get(key: string): Promise<unknown> {
    const client = this.getClient()
    if (!client) return null

    let raw: string | null
    try {
      raw = await client.get(this.prefix + key)
    } catch (err) {
      logger.warn({ err, key }, "Redis cache read failed")
      return null
    }
    if (raw === null) return null

    try {
      const value: unknown = JSON.parse(raw)
      return value
    } catch (err) {
      logger.warn({ err, key }, "Discarding undecodable cache entry")
      return null
    }
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    const client = this.getClient()
    if (!client) return

    try {
      await client.set(this.prefix + key, JSON.stringify(value), "EX", ttlSeconds)
    } catch (err) {
      logger.warn({ err, key }, "Redis cache write failed")
    }
  }
}
