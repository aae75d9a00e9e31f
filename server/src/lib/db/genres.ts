/**
 * Genre database functions.
 */

import { placeholders, type Queryable } from "./pool.js"
import type { GenreInput, GenreRecord } from "./types.js"

const GENRE_COLUMNS = "id, tmdb_id, name"

// All genres, ordered by name
export async function listGenres(db: Queryable): Promise<GenreRecord[]> {
  const result = await db.query<GenreRecord>(
    `SELECT ${GENRE_COLUMNS} FROM genres ORDER BY name, id`
  )
  return result.rows
}

// Genres matching the given TMDB IDs; unknown IDs are simply absent
export async function getGenresByTmdbIds(db: Queryable, tmdbIds: number[]): Promise<GenreRecord[]> {
  if (tmdbIds.length === 0) return []

  const result = await db.query<GenreRecord>(
    `SELECT ${GENRE_COLUMNS} FROM genres WHERE tmdb_id IN (${placeholders(tmdbIds.length)})`,
    tmdbIds
  )
  return result.rows
}

// Case-insensitive exact name match
export async function findGenreByName(db: Queryable, name: string): Promise<GenreRecord | null> {
  const result = await db.query<GenreRecord>(
    `SELECT ${GENRE_COLUMNS} FROM genres WHERE LOWER(name) = LOWER($1) ORDER BY id LIMIT 1`,
    [name]
  )
  return result.rows[0] || null
}

/**
 * Insert or update genres by TMDB ID. Existing rows take the incoming name,
 * which is how renamed genres get corrected.
 */
export async function upsertGenres(db: Queryable, genres: GenreInput[]): Promise<void> {
  // A single INSERT cannot touch the same conflict key twice
  const byTmdbId = new Map<number, string>()
  for (const genre of genres) {
    byTmdbId.set(genre.tmdb_id, genre.name)
  }
  if (byTmdbId.size === 0) return

  const values: (number | string)[] = []
  const rows: string[] = []
  let paramIndex = 1
  for (const [tmdbId, name] of byTmdbId) {
    values.push(tmdbId, name)
    rows.push(`($${paramIndex}, $${paramIndex + 1})`)
    paramIndex += 2
  }

  await db.query(
    `INSERT INTO genres (tmdb_id, name) VALUES ${rows.join(", ")}
     ON CONFLICT (tmdb_id) DO UPDATE SET name = EXCLUDED.name`,
    values
  )
}
