/**
 * User favorite database functions.
 */

import { getMoviesByIds, withGenres } from "./movies.js"
import { placeholders, type Queryable } from "./pool.js"
import type { FavoriteRecord, FavoriteWithMovie } from "./types.js"

const FAVORITE_COLUMNS = "id, user_id, movie_id, created_at"

// A user's favorites with their movies, newest first
export async function listFavorites(db: Queryable, userId: number): Promise<FavoriteWithMovie[]> {
  const result = await db.query<FavoriteRecord>(
    `SELECT ${FAVORITE_COLUMNS} FROM user_favorites
     WHERE user_id = $1
     ORDER BY created_at DESC, id DESC`,
    [userId]
  )

  const movies = await getMoviesByIds(
    db,
    result.rows.map((row) => row.movie_id)
  )
  const moviesWithGenres = await withGenres(db, [...movies.values()])
  const byId = new Map(moviesWithGenres.map((movie) => [movie.id, movie]))

  const favorites: FavoriteWithMovie[] = []
  for (const row of result.rows) {
    const movie = byId.get(row.movie_id)
    if (movie) {
      favorites.push({ ...row, movie })
    }
  }
  return favorites
}

/**
 * Add a favorite. Returns null when the user already favorited the movie.
 */
export async function addFavorite(
  db: Queryable,
  userId: number,
  movieId: number
): Promise<FavoriteRecord | null> {
  const result = await db.query<FavoriteRecord>(
    `INSERT INTO user_favorites (user_id, movie_id) VALUES ($1, $2)
     ON CONFLICT (user_id, movie_id) DO NOTHING
     RETURNING ${FAVORITE_COLUMNS}`,
    [userId, movieId]
  )
  return result.rows[0] || null
}

/**
 * Delete one of the user's favorites. Returns false if it does not exist or
 * belongs to someone else.
 */
export async function deleteFavorite(
  db: Queryable,
  userId: number,
  favoriteId: number
): Promise<boolean> {
  const result = await db.query<{ id: number }>(
    "DELETE FROM user_favorites WHERE id = $1 AND user_id = $2 RETURNING id",
    [favoriteId, userId]
  )
  return result.rows.length > 0
}

export async function countFavorites(db: Queryable, userId: number): Promise<number> {
  const result = await db.query<{ count: number }>(
    "SELECT COUNT(*)::int AS count FROM user_favorites WHERE user_id = $1",
    [userId]
  )
  return result.rows[0]?.count ?? 0
}

// The subset of movieIds the user has favorited
export async function getFavoritedMovieIds(
  db: Queryable,
  userId: number,
  movieIds: number[]
): Promise<Set<number>> {
  if (movieIds.length === 0) return new Set()

  const result = await db.query<{ movie_id: number }>(
    `SELECT movie_id FROM user_favorites
     WHERE user_id = $1 AND movie_id IN (${placeholders(movieIds.length, 2)})`,
    [userId, ...movieIds]
  )
  return new Set(result.rows.map((row) => row.movie_id))
}
