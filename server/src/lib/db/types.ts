/**
 * Row types for the catalog tables.
 */

export interface MovieRecord {
  id: number
  tmdb_id: number
  title: string
  overview: string
  release_date: string | null // YYYY-MM-DD
  vote_average: number
  popularity: number
  poster_path: string | null
  backdrop_path: string | null
  created_at: Date
  updated_at: Date
}

// Every mutable column, written in full on each upsert
export type MovieInput = Omit<MovieRecord, "id" | "created_at" | "updated_at">

export interface GenreRecord {
  id: number
  tmdb_id: number
  name: string
}

export type GenreInput = Pick<GenreRecord, "tmdb_id" | "name">

export interface MovieWithGenres extends MovieRecord {
  genres: GenreRecord[]
}

export interface UserRecord {
  id: number
  username: string
  email: string
  first_name: string
  last_name: string
  created_at: Date
}

export interface UserCredentialsRecord extends UserRecord {
  password_hash: string
}

export type UserInput = Pick<
  UserCredentialsRecord,
  "username" | "email" | "first_name" | "last_name" | "password_hash"
>

export interface FavoriteRecord {
  id: number
  user_id: number
  movie_id: number
  created_at: Date
}

export interface FavoriteWithMovie extends FavoriteRecord {
  movie: MovieWithGenres
}

export interface MoviesByGenreOptions {
  limit: number
  offset: number
}
