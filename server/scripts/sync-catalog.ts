#!/usr/bin/env tsx
/**
 * Pre-warm the local catalog from TMDB.
 *
 * Materializes the genre catalog, then pulls pages of popular and trending
 * movies through the same cache and merge path the API uses.
 *
 * Usage:
 *   npm run sync:catalog -- [options]
 *
 * Options:
 *   --popular-pages <n>    Pages of popular movies to merge (default: 1)
 *   --trending <window>    Trending time window, day or week (default: day)
 *   --trending-pages <n>   Pages of trending movies to merge (default: 1)
 *
 * Examples:
 *   npm run sync:catalog                                  # genres + 1 page each
 *   npm run sync:catalog -- --popular-pages 5             # 5 pages of popular movies
 *   npm run sync:catalog -- --trending week --trending-pages 3
 */

import "dotenv/config"
import { Command, InvalidArgumentError } from "commander"
import { MemoryResponseCache } from "../src/lib/cache.js"
import { CatalogService, type MoviePage } from "../src/lib/catalog-service.js"
import { loadConfig } from "../src/lib/config.js"
import { closePool, createPool } from "../src/lib/db/index.js"
import { logger } from "../src/lib/logger.js"
import { TmdbClient, isTimeWindow, type TimeWindow } from "../src/lib/tmdb.js"

export function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10)
  if (isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer")
  }
  return parsed
}

export function parseTimeWindow(value: string): TimeWindow {
  if (!isTimeWindow(value)) {
    throw new InvalidArgumentError('Must be "day" or "week"')
  }
  return value
}

export interface SyncOptions {
  popularPages: number
  trending: TimeWindow
  trendingPages: number
}

export interface SyncResult {
  genres: number
  popularMovies: number
  trendingMovies: number
}

// The catalog operations the sync drives
export type CatalogSyncTarget = Pick<CatalogService, "syncGenres" | "getPopular" | "getTrending">

/**
 * Fetch `pages` pages in order, stopping early once past the provider's last page.
 */
async function mergePages(pages: number, fetchPage: (page: number) => Promise<MoviePage>) {
  let merged = 0
  for (let page = 1; page <= pages; page++) {
    const result = await fetchPage(page)
    merged += result.movies.length
    if (page >= result.totalPages) break
  }
  return merged
}

export async function runCatalogSync(
  catalog: CatalogSyncTarget,
  options: SyncOptions
): Promise<SyncResult> {
  const genres = await catalog.syncGenres()
  logger.info({ genres }, "Genre catalog synced")

  const popularMovies = await mergePages(options.popularPages, (page) => catalog.getPopular(page))
  logger.info({ popularMovies, pages: options.popularPages }, "Popular movies merged")

  const trendingMovies = await mergePages(options.trendingPages, (page) =>
    catalog.getTrending(options.trending, page)
  )
  logger.info(
    { trendingMovies, window: options.trending, pages: options.trendingPages },
    "Trending movies merged"
  )

  return { genres, popularMovies, trendingMovies }
}

const program = new Command()
  .name("sync-catalog")
  .description("Materialize genres and pre-warm popular and trending movies from TMDB")
  .option("--popular-pages <n>", "Pages of popular movies to merge", parsePositiveInt, 1)
  .option("--trending <window>", "Trending time window (day or week)", parseTimeWindow, "day")
  .option("--trending-pages <n>", "Pages of trending movies to merge", parsePositiveInt, 1)
  .action(async (options: SyncOptions) => {
    const config = loadConfig()
    const pool = createPool(config.databaseUrl)
    const cache = new MemoryResponseCache()

    try {
      const catalog = new CatalogService({
        db: pool,
        provider: new TmdbClient(config.tmdb),
        cache,
        cacheTtl: config.cacheTtl,
      })

      const result = await runCatalogSync(catalog, options)

      console.log("\nSync complete:")
      console.log(`  Genres:           ${result.genres}`)
      console.log(`  Popular movies:   ${result.popularMovies}`)
      console.log(`  Trending movies:  ${result.trendingMovies}`)
    } catch (error) {
      logger.error({ error }, "Catalog sync failed")
      process.exitCode = 1
    } finally {
      cache.destroy()
      await closePool(pool)
    }
  })

// Only run when executed directly
const isMainModule = import.meta.url === `file://${process.argv[1]}`
if (isMainModule) {
  program.parse()
}
