import "dotenv/config"
import { createApp } from "./app.js"
import { MemoryResponseCache, type ResponseCache } from "./lib/cache.js"
import { CatalogService } from "./lib/catalog-service.js"
import { loadConfig } from "./lib/config.js"
import { closePool, createPool } from "./lib/db/index.js"
import { logger } from "./lib/logger.js"
import { RedisResponseCache, closeRedis, initRedis } from "./lib/redis.js"
import { runMigrations } from "./lib/startup.js"
import { TmdbClient } from "./lib/tmdb.js"

async function startServer() {
  const config = loadConfig()

  await runMigrations(config.databaseUrl)

  const pool = createPool(config.databaseUrl)
  const redisReady = await initRedis(config.redisUrl)
  const memoryCache = redisReady ? null : new MemoryResponseCache()
  const cache: ResponseCache = memoryCache ?? new RedisResponseCache()

  const catalog = new CatalogService({
    db: pool,
    provider: new TmdbClient(config.tmdb),
    cache,
    cacheTtl: config.cacheTtl,
  })

  const app = createApp({ db: pool, catalog, authConfig: config.auth })

  const server = app.listen(config.port, () => {
    logger.info(
      { port: config.port, cache: redisReady ? "redis" : "memory" },
      `Server running on port ${config.port}`
    )
  })

  let shuttingDown = false
  const shutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info({ signal }, "Shutting down")

    await new Promise<void>((resolve) => server.close(() => resolve()))
    memoryCache?.destroy()
    await closePool(pool)
    await closeRedis()
    process.exit(0)
  }

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error({ error }, "Error during shutdown")
        process.exit(1)
      })
    })
  }
}

startServer().catch((error) => {
  logger.fatal({ error }, "Failed to start server")
  process.exit(1)
})
