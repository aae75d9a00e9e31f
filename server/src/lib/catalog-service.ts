/**
 * Catalog query operations.
 *
 * Each provider-backed operation follows the same path: build the cache key,
 * serve the cached payload or fetch it from TMDB, merge every record into the
 * local store, and return the merged movies with the provider's page count.
 * By-genre listing is answered from the local store alone.
 */

import {
  CACHE_KEYS,
  SEARCH_CACHE_TTL_SECONDS,
  getCachedOrFetch,
  type ResponseCache,
} from "./cache.js"
import type { CacheTtlConfig } from "./config.js"
import {
  countMoviesByGenre,
  findGenreByName,
  getMovieByTmdbId,
  getMoviesByGenre,
  listGenres,
  withGenres,
  type GenreRecord,
  type Database,
  type MovieWithGenres,
} from "./db/index.js"
import { NotFoundError, ValidationError } from "./errors.js"
import { GenreCatalog } from "./genre-resolver.js"
import { logger } from "./logger.js"
import { MovieMerger } from "./movie-merge.js"
import { buildPagination, calculateOffset } from "./pagination.js"
import {
  TmdbMovieListSchema,
  isTimeWindow,
  type MovieProvider,
  type TmdbMovieList,
} from "./tmdb.js"

export const GENRE_PAGE_SIZE = 20

export interface MoviePage {
  movies: MovieWithGenres[]
  totalPages: number
}

export interface GenreMoviePage extends MoviePage {
  genre: GenreRecord
}

export interface CatalogServiceDeps {
  db: Database
  provider: MovieProvider
  cache: ResponseCache
  cacheTtl: CacheTtlConfig
}

function emptyPage(): MoviePage {
  return { movies: [], totalPages: 0 }
}

// Null for a missing payload or one without a usable list envelope
function parseMovieList(key: string, payload: unknown): TmdbMovieList | null {
  if (payload === null) return null

  const parsed = TmdbMovieListSchema.safeParse(payload)
  if (!parsed.success) {
    logger.warn({ key, issues: parsed.error.issues }, "Ignoring malformed TMDB movie list")
    return null
  }
  return parsed.data
}

function assertPage(page: number): void {
  if (!Number.isInteger(page) || page < 1) {
    throw new ValidationError("page must be a positive integer")
  }
}

export class CatalogService {
  private readonly genreCatalog: GenreCatalog
  private readonly merger: MovieMerger

  constructor(private readonly deps: CatalogServiceDeps) {
    this.genreCatalog = new GenreCatalog({
      db: deps.db,
      provider: deps.provider,
      cache: deps.cache,
      ttlSeconds: deps.cacheTtl.genres,
    })
    this.merger = new MovieMerger(deps.db, this.genreCatalog)
  }

  /**
   * Materialize the provider's genre catalog locally.
   * Returns the number of genres applied (0 when TMDB was unreachable).
   */
  async syncGenres(): Promise<number> {
    return this.genreCatalog.sync()
  }

  /**
   * Refresh the genre catalog from TMDB, then list every local genre.
   * When TMDB is unreachable the locally stored genres are still returned.
   */
  async listGenres(): Promise<GenreRecord[]> {
    await this.syncGenres()
    return listGenres(this.deps.db)
  }

  async getTrending(window: string, page = 1): Promise<MoviePage> {
    if (!isTimeWindow(window)) {
      throw new ValidationError('time_window must be "day" or "week"')
    }
    assertPage(page)

    return this.fetchMovieList(CACHE_KEYS.trending(window, page), this.deps.cacheTtl.trending, () =>
      this.deps.provider.getTrending(window, page)
    )
  }

  async getPopular(page = 1): Promise<MoviePage> {
    assertPage(page)

    return this.fetchMovieList(CACHE_KEYS.popular(page), this.deps.cacheTtl.popular, () =>
      this.deps.provider.getPopular(page)
    )
  }

  /**
   * Search TMDB by title. A blank query returns an empty page without
   * touching the cache or the provider.
   */
  async searchMovies(query: string, page = 1): Promise<MoviePage> {
    const trimmed = query.trim()
    if (!trimmed) {
      return emptyPage()
    }
    assertPage(page)

    return this.fetchMovieList(CACHE_KEYS.search(trimmed, page), SEARCH_CACHE_TTL_SECONDS, () =>
      this.deps.provider.searchMovies(trimmed, page)
    )
  }

  /**
   * A movie by TMDB ID: the stored row when we have one, otherwise a live
   * fetch merged as a detail record.
   */
  async getMovieDetails(tmdbId: number): Promise<MovieWithGenres> {
    if (!Number.isInteger(tmdbId) || tmdbId < 1) {
      throw new ValidationError("Movie ID must be a positive integer")
    }

    const { db, provider, cache, cacheTtl } = this.deps

    const local = await getMovieByTmdbId(db, tmdbId)
    if (local) {
      const [movie] = await withGenres(db, [local])
      return movie
    }

    const payload = await getCachedOrFetch(
      cache,
      CACHE_KEYS.movieDetails(tmdbId),
      cacheTtl.details,
      () => provider.getMovieDetails(tmdbId)
    )
    const merged = payload === null ? null : await this.merger.merge(payload, true)
    if (!merged) {
      throw new NotFoundError("Movie not found")
    }

    const [movie] = await withGenres(db, [merged])
    return movie
  }

  /**
   * Locally stored movies in a genre, most popular first, GENRE_PAGE_SIZE per page.
   * An unknown genre is a NotFoundError; a known genre with no movies (or a
   * page past the end) is an empty page.
   */
  async getMoviesByGenre(genreName: string, page = 1): Promise<GenreMoviePage> {
    const name = genreName.trim()
    if (!name) {
      throw new ValidationError("Genre parameter is required")
    }
    assertPage(page)

    const { db } = this.deps
    const genre = await findGenreByName(db, name)
    if (!genre) {
      throw new NotFoundError(`Genre "${name}" not found`)
    }

    const totalCount = await countMoviesByGenre(db, genre.id)
    const { totalPages } = buildPagination(page, GENRE_PAGE_SIZE, totalCount)
    const movies = await getMoviesByGenre(db, genre.id, {
      limit: GENRE_PAGE_SIZE,
      offset: calculateOffset(page, GENRE_PAGE_SIZE),
    })

    return {
      genre,
      movies: await withGenres(db, movies),
      totalPages,
    }
  }

  private async fetchMovieList(
    key: string,
    ttlSeconds: number,
    fetchFn: () => Promise<unknown>
  ): Promise<MoviePage> {
    // Only envelopes that validate are cached
    const payload = await getCachedOrFetch(this.deps.cache, key, ttlSeconds, async () =>
      parseMovieList(key, await fetchFn())
    )
    const list = parseMovieList(key, payload)
    if (!list) {
      return emptyPage()
    }

    const merged = await this.merger.mergeBatch(list.results, false)
    return {
      movies: await withGenres(this.deps.db, merged),
      totalPages: list.total_pages ?? 1,
    }
  }
}
