import { z } from "zod"
import type { TmdbClientConfig } from "./config.js"
import { logger } from "./logger.js"

export const TIME_WINDOWS = ["day", "week"] as const
export type TimeWindow = (typeof TIME_WINDOWS)[number]

export function isTimeWindow(value: string): value is TimeWindow {
  return TIME_WINDOWS.some((window) => window === value)
}

// TMDB API Response Schemas
// Payloads stay `unknown` until they pass through one of these.

export const TmdbGenreSchema = z.object({
  id: z.number().int(),
  name: z.string(),
})
export type TmdbGenre = z.infer<typeof TmdbGenreSchema>

export const TmdbGenreListSchema = z.object({
  genres: z.array(TmdbGenreSchema),
})

// Only `id` is mandatory; release_date is parsed separately so a bad date
// never rejects the record
export const TmdbMovieSchema = z.object({
  id: z.number().int().positive(),
  title: z.string().nullish(),
  overview: z.string().nullish(),
  release_date: z.unknown().optional(),
  vote_average: z.number().nullish(),
  popularity: z.number().nullish(),
  poster_path: z.string().nullish(),
  backdrop_path: z.string().nullish(),
  genre_ids: z.array(z.number().int()).nullish(),
  genres: z.array(TmdbGenreSchema).nullish(),
})
export type TmdbMovie = z.infer<typeof TmdbMovieSchema>

// Records are validated one at a time by the merge step
export const TmdbMovieListSchema = z.object({
  page: z.number().int().optional(),
  results: z.array(z.unknown()),
  total_pages: z.number().int().nonnegative().optional(),
  total_results: z.number().int().nonnegative().optional(),
})
export type TmdbMovieList = z.infer<typeof TmdbMovieListSchema>

/**
 * The provider operations the catalog consumes. Each resolves to the raw
 * JSON payload, or null when the call failed.
 */
export interface MovieProvider {
  getGenres(): Promise<unknown>
  getTrending(window: TimeWindow, page: number): Promise<unknown>
  getPopular(page: number): Promise<unknown>
  getMovieDetails(tmdbId: number): Promise<unknown>
  searchMovies(query: string, page: number): Promise<unknown>
}

type QueryParams = Record<string, string | number | boolean>

/**
 * Thin TMDB HTTP client.
 *
 * Every call carries the bearer token and is aborted after the configured
 * timeout. Failures (timeout, network error, non-2xx status, unparsable body)
 * are logged and turned into null; callers never see the transport error.
 * There are no retries here.
 */
export class TmdbClient implements MovieProvider {
  constructor(private readonly config: TmdbClientConfig) {}

  async fetch(endpoint: string, params: QueryParams = {}): Promise<unknown> {
    const url = this.buildUrl(endpoint, params)

    try {
      const response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${this.config.apiToken}`,
          accept: "application/json",
        },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      })

      if (!response.ok) {
        logger.warn(
          { endpoint, status: response.status, statusText: response.statusText },
          "TMDB request failed"
        )
        return null
      }

      const payload: unknown = await response.json()
      return payload
    } catch (err) {
      logger.error({ err, endpoint }, "TMDB request error")
      return null
    }
  }

  buildUrl(endpoint: string, params: QueryParams = {}): string {
    const search = new URLSearchParams()
    for (const [key, value] of Object.entries(params)) {
      search.set(key, String(value))
    }
    const query = search.toString()
    const path = endpoint.replace(/^\/+/, "")
    return `${this.config.baseUrl}/${path}${query ? `?${query}` : ""}`
  }

  getGenres(): Promise<unknown> {
    return this.fetch("genre/movie/list", { language: "en-US" })
  }

  getTrending(window: TimeWindow, page: number): Promise<unknown> {
    return this.fetch(`trending/movie/${window}`, { page })
  }

  getPopular(page: number): Promise<unknown> {
    return this.fetch("movie/popular", { page })
  }

  getMovieDetails(tmdbId: number): Promise<unknown> {
    return this.fetch(`movie/${tmdbId}`, { language: "en-US" })
  }

  searchMovies(query: string, page: number): Promise<unknown> {
    return this.fetch("search/movie", { query, page, include_adult: false })
  }
}
