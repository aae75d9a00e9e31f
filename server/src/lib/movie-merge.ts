/**
 * Merges raw TMDB movie records into the local movie/genre tables.
 *
 * A merge is an upsert keyed by TMDB ID followed by a full replacement of the
 * movie's genre links. Each record succeeds or fails on its own: a malformed
 * record is logged and skipped without affecting the rest of its batch.
 */

import { parseReleaseDate } from "./date-utils.js"
import {
  replaceMovieGenres,
  upsertGenres,
  upsertMovie,
  type MovieInput,
  type Database,
  type MovieRecord,
} from "./db/index.js"
import type { GenreResolver } from "./genre-resolver.js"
import { logger } from "./logger.js"
import { TmdbMovieSchema, type TmdbMovie } from "./tmdb.js"

const MIN_VOTE_AVERAGE = 0
const MAX_VOTE_AVERAGE = 10

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

/**
 * Build the full set of mutable movie columns from a validated record.
 * Missing text becomes "", missing numbers 0, missing image paths null.
 */
export function buildMovieInput(record: TmdbMovie): MovieInput {
  return {
    tmdb_id: record.id,
    title: record.title ?? "",
    overview: record.overview ?? "",
    release_date: parseReleaseDate(record.release_date),
    vote_average: clamp(record.vote_average ?? 0, MIN_VOTE_AVERAGE, MAX_VOTE_AVERAGE),
    popularity: Math.max(0, record.popularity ?? 0),
    poster_path: record.poster_path || null,
    backdrop_path: record.backdrop_path || null,
  }
}

/**
 * The genre IDs a record carries. Detail payloads hold `genres` objects and
 * list payloads hold bare `genre_ids`; each falls back to the other shape.
 * Returns null when the record carries neither. Merging leaves the links
 * alone for null and for an empty list.
 */
export function extractGenreIds(record: TmdbMovie, detailed: boolean): number[] | null {
  const fromObjects = record.genres ? record.genres.map((genre) => genre.id) : null
  const fromIds = record.genre_ids ?? null

  return detailed ? (fromObjects ?? fromIds) : (fromIds ?? fromObjects)
}

function describeRecordId(raw: unknown): unknown {
  if (typeof raw === "object" && raw !== null && "id" in raw) {
    return raw.id
  }
  return undefined
}

export class MovieMerger {
  constructor(
    private readonly db: Database,
    private readonly genres: GenreResolver
  ) {}

  /**
   * Merge one raw record. Returns the stored movie, or null if the record was
   * malformed or the merge failed.
   */
  async merge(raw: unknown, detailed: boolean): Promise<MovieRecord | null> {
    const parsed = TmdbMovieSchema.safeParse(raw)
    if (!parsed.success) {
      logger.error(
        { tmdbId: describeRecordId(raw), issues: parsed.error.issues },
        "Skipping malformed TMDB movie record"
      )
      return null
    }

    const record = parsed.data
    try {
      const movie = await upsertMovie(this.db, buildMovieInput(record))

      const genreIds = extractGenreIds(record, detailed)
      if (genreIds !== null && genreIds.length > 0) {
        await this.replaceGenres(movie, record, genreIds)
      }

      return movie
    } catch (err) {
      logger.error({ err, tmdbId: record.id }, "Error creating/updating movie")
      return null
    }
  }

  /**
   * Merge records in order, returning only the ones that succeeded.
   */
  async mergeBatch(records: unknown[], detailed: boolean): Promise<MovieRecord[]> {
    const movies: MovieRecord[] = []
    for (const raw of records) {
      const movie = await this.merge(raw, detailed)
      if (movie) {
        movies.push(movie)
      }
    }
    return movies
  }

  private async replaceGenres(movie: MovieRecord, record: TmdbMovie, genreIds: number[]) {
    // Genre objects carry names, so they can be stored without the catalog
    if (record.genres && record.genres.length > 0) {
      await upsertGenres(
        this.db,
        record.genres.map((genre) => ({ tmdb_id: genre.id, name: genre.name }))
      )
    }

    const resolved = await this.genres.resolve(genreIds)
    const unresolved = genreIds.filter((id) => !resolved.some((genre) => genre.tmdb_id === id))
    if (unresolved.length > 0) {
      logger.debug({ tmdbId: movie.tmdb_id, unresolved }, "Skipping unknown genre IDs")
    }

    await replaceMovieGenres(
      this.db,
      movie.id,
      resolved.map((genre) => genre.id)
    )
  }
}
