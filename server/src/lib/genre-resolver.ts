/**
 * Genre catalog materialization and lookup.
 */

import { CACHE_KEYS, getCachedOrFetch, type ResponseCache } from "./cache.js"
import { getGenresByTmdbIds, upsertGenres, type GenreRecord, type Queryable } from "./db/index.js"
import { logger } from "./logger.js"
import { TmdbGenreListSchema, type MovieProvider } from "./tmdb.js"

/**
 * Maps TMDB genre IDs to local genre rows. Given to the merge engine so it
 * never calls back into the catalog operations itself.
 */
export interface GenreResolver {
  /** Local genres for the IDs; IDs without a local genre are left out. */
  resolve(tmdbIds: number[]): Promise<GenreRecord[]>
}

export interface GenreCatalogDeps {
  db: Queryable
  provider: MovieProvider
  cache: ResponseCache
  ttlSeconds: number
}

export class GenreCatalog implements GenreResolver {
  constructor(private readonly deps: GenreCatalogDeps) {}

  /**
   * Load the provider's genre list (cache first) and upsert it locally.
   * Returns the number of genres applied; 0 when the payload was missing or malformed.
   */
  async sync(): Promise<number> {
    const { db, provider, cache, ttlSeconds } = this.deps

    const payload = await getCachedOrFetch(cache, CACHE_KEYS.genres(), ttlSeconds, () =>
      provider.getGenres()
    )
    if (payload === null) {
      return 0
    }

    const parsed = TmdbGenreListSchema.safeParse(payload)
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues }, "Ignoring malformed TMDB genre list")
      return 0
    }

    await upsertGenres(
      db,
      parsed.data.genres.map((genre) => ({ tmdb_id: genre.id, name: genre.name }))
    )
    return parsed.data.genres.length
  }

  async resolve(tmdbIds: number[]): Promise<GenreRecord[]> {
    const wanted = [...new Set(tmdbIds)]
    if (wanted.length === 0) return []

    const local = await getGenresByTmdbIds(this.deps.db, wanted)
    if (local.length === wanted.length) {
      return local
    }

    // Some IDs are not materialized yet: pull the catalog once and look again
    await this.sync()
    return getGenresByTmdbIds(this.deps.db, wanted)
  }
}
