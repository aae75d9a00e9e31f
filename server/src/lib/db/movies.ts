/**
 * Movie database functions.
 *
 * Upserts keyed by TMDB ID, genre association replacement, and the
 * local by-genre listing.
 */

import { placeholders, withTransaction, type Database, type Queryable } from "./pool.js"
import type {
  GenreRecord,
  MovieInput,
  MovieRecord,
  MovieWithGenres,
  MoviesByGenreOptions,
} from "./types.js"

// release_date comes back as text so pg and PGlite agree on its shape
export const MOVIE_COLUMNS = `m.id, m.tmdb_id, m.title, m.overview,
  to_char(m.release_date, 'YYYY-MM-DD') AS release_date,
  m.vote_average, m.popularity, m.poster_path, m.backdrop_path,
  m.created_at, m.updated_at`

// ============================================================================
// Movie CRUD functions
// ============================================================================

// Insert or update a movie, replacing every mutable field
export async function upsertMovie(db: Queryable, movie: MovieInput): Promise<MovieRecord> {
  const result = await db.query<MovieRecord>(
    `INSERT INTO movies AS m (tmdb_id, title, overview, release_date, vote_average, popularity, poster_path, backdrop_path)
     VALUES ($1, $2, $3, $4::date, $5, $6, $7, $8)
     ON CONFLICT (tmdb_id) DO UPDATE SET
       title = EXCLUDED.title,
       overview = EXCLUDED.overview,
       release_date = EXCLUDED.release_date,
       vote_average = EXCLUDED.vote_average,
       popularity = EXCLUDED.popularity,
       poster_path = EXCLUDED.poster_path,
       backdrop_path = EXCLUDED.backdrop_path,
       updated_at = NOW()
     RETURNING ${MOVIE_COLUMNS}`,
    [
      movie.tmdb_id,
      movie.title,
      movie.overview,
      movie.release_date,
      movie.vote_average,
      movie.popularity,
      movie.poster_path,
      movie.backdrop_path,
    ]
  )
  return result.rows[0]
}

// Get a movie by TMDB ID
export async function getMovieByTmdbId(db: Queryable, tmdbId: number): Promise<MovieRecord | null> {
  const result = await db.query<MovieRecord>(
    `SELECT ${MOVIE_COLUMNS} FROM movies m WHERE m.tmdb_id = $1`,
    [tmdbId]
  )
  return result.rows[0] || null
}

// Get a movie by local ID
export async function getMovieById(db: Queryable, id: number): Promise<MovieRecord | null> {
  const result = await db.query<MovieRecord>(`SELECT ${MOVIE_COLUMNS} FROM movies m WHERE m.id = $1`, [
    id,
  ])
  return result.rows[0] || null
}

// Get movies by local IDs, keyed by ID
export async function getMoviesByIds(db: Queryable, ids: number[]): Promise<Map<number, MovieRecord>> {
  if (ids.length === 0) return new Map()

  const result = await db.query<MovieRecord>(
    `SELECT ${MOVIE_COLUMNS} FROM movies m WHERE m.id IN (${placeholders(ids.length)})`,
    ids
  )

  const map = new Map<number, MovieRecord>()
  for (const row of result.rows) {
    map.set(row.id, row)
  }
  return map
}

// ============================================================================
// Genre associations
// ============================================================================

/**
 * Replace the genre links of a movie with exactly the given genres.
 * Runs as one transaction holding the movie row lock, so concurrent
 * replacements of the same movie apply one after the other and a failed
 * insert keeps the previous links.
 */
export async function replaceMovieGenres(
  db: Database,
  movieId: number,
  genreIds: number[]
): Promise<void> {
  const uniqueIds = [...new Set(genreIds)]

  await withTransaction(db, async (tx) => {
    await tx.query("SELECT id FROM movies WHERE id = $1 FOR UPDATE", [movieId])
    await tx.query("DELETE FROM movie_genres WHERE movie_id = $1", [movieId])
    if (uniqueIds.length === 0) return

    const values = uniqueIds.map((_, i) => `($1, $${i + 2})`).join(", ")
    await tx.query(
      `INSERT INTO movie_genres (movie_id, genre_id) VALUES ${values}
       ON CONFLICT (movie_id, genre_id) DO NOTHING`,
      [movieId, ...uniqueIds]
    )
  })
}

// Genres linked to each movie, ordered by name
export async function getGenresForMovies(
  db: Queryable,
  movieIds: number[]
): Promise<Map<number, GenreRecord[]>> {
  const map = new Map<number, GenreRecord[]>()
  if (movieIds.length === 0) return map

  const result = await db.query<GenreRecord & { movie_id: number }>(
    `SELECT mg.movie_id, g.id, g.tmdb_id, g.name
     FROM movie_genres mg
     JOIN genres g ON g.id = mg.genre_id
     WHERE mg.movie_id IN (${placeholders(movieIds.length)})
     ORDER BY g.name, g.id`,
    movieIds
  )

  for (const { movie_id, ...genre } of result.rows) {
    const genres = map.get(movie_id)
    if (genres) {
      genres.push(genre)
    } else {
      map.set(movie_id, [genre])
    }
  }
  return map
}

/**
 * Attach genres to movies, preserving the order of the input.
 */
export async function withGenres(db: Queryable, movies: MovieRecord[]): Promise<MovieWithGenres[]> {
  const genresByMovie = await getGenresForMovies(
    db,
    movies.map((movie) => movie.id)
  )
  return movies.map((movie) => ({ ...movie, genres: genresByMovie.get(movie.id) ?? [] }))
}

// ============================================================================
// By-genre listing
// ============================================================================

// Movies linked to a genre, most popular first
export async function getMoviesByGenre(
  db: Queryable,
  genreId: number,
  { limit, offset }: MoviesByGenreOptions
): Promise<MovieRecord[]> {
  const result = await db.query<MovieRecord>(
    `SELECT ${MOVIE_COLUMNS}
     FROM movies m
     JOIN movie_genres mg ON mg.movie_id = m.id
     WHERE mg.genre_id = $1
     ORDER BY m.popularity DESC, m.id ASC
     LIMIT $2 OFFSET $3`,
    [genreId, limit, offset]
  )
  return result.rows
}

export async function countMoviesByGenre(db: Queryable, genreId: number): Promise<number> {
  const result = await db.query<{ count: number }>(
    "SELECT COUNT(*)::int AS count FROM movie_genres WHERE genre_id = $1",
    [genreId]
  )
  return result.rows[0]?.count ?? 0
}
