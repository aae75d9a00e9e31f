/**
 * JSON shapes returned by the movie and account routes.
 */

import type {
  FavoriteRecord,
  GenreRecord,
  MovieWithGenres,
  UserRecord,
} from "../lib/db/index.js"

export const POSTER_BASE_URL = "https://image.tmdb.org/t/p/w500"
export const BACKDROP_BASE_URL = "https://image.tmdb.org/t/p/w1280"

export interface GenreJson {
  id: number
  name: string
  tmdb_id: number
}

export interface MovieListItemJson {
  id: number
  tmdb_id: number
  title: string
  release_date: string | null
  vote_average: number
  popularity: number
  poster_url: string | null
  genres: string[]
  is_favorited: boolean
}

export interface MovieDetailJson {
  id: number
  tmdb_id: number
  title: string
  overview: string
  release_date: string | null
  vote_average: number
  popularity: number
  poster_path: string | null
  backdrop_path: string | null
  poster_url: string | null
  backdrop_url: string | null
  genres: GenreJson[]
  is_favorited: boolean
  created_at: Date
  updated_at: Date
}

export interface FavoriteJson {
  id: number
  movie: MovieListItemJson
  created_at: Date
}

export interface UserJson {
  id: number
  username: string
  email: string
  first_name: string
  last_name: string
}

export interface ListEnvelope {
  results: MovieListItemJson[]
  page: number
  total_pages: number
  count: number
}

function imageUrl(base: string, path: string | null): string | null {
  return path ? `${base}${path}` : null
}

export function serializeGenre(genre: GenreRecord): GenreJson {
  return { id: genre.id, name: genre.name, tmdb_id: genre.tmdb_id }
}

export function serializeMovieListItem(movie: MovieWithGenres, favorited: boolean): MovieListItemJson {
  return {
    id: movie.id,
    tmdb_id: movie.tmdb_id,
    title: movie.title,
    release_date: movie.release_date,
    vote_average: movie.vote_average,
    popularity: movie.popularity,
    poster_url: imageUrl(POSTER_BASE_URL, movie.poster_path),
    genres: movie.genres.map((genre) => genre.name),
    is_favorited: favorited,
  }
}

export function serializeMovieDetail(movie: MovieWithGenres, favorited: boolean): MovieDetailJson {
  return {
    id: movie.id,
    tmdb_id: movie.tmdb_id,
    title: movie.title,
    overview: movie.overview,
    release_date: movie.release_date,
    vote_average: movie.vote_average,
    popularity: movie.popularity,
    poster_path: movie.poster_path,
    backdrop_path: movie.backdrop_path,
    poster_url: imageUrl(POSTER_BASE_URL, movie.poster_path),
    backdrop_url: imageUrl(BACKDROP_BASE_URL, movie.backdrop_path),
    genres: movie.genres.map(serializeGenre),
    is_favorited: favorited,
    created_at: movie.created_at,
    updated_at: movie.updated_at,
  }
}

/**
 * Build the list envelope. `favoritedIds` holds the local IDs of movies the
 * caller has favorited (empty for anonymous callers).
 */
export function serializeMoviePage(
  movies: MovieWithGenres[],
  page: number,
  totalPages: number,
  favoritedIds: Set<number>
): ListEnvelope {
  return {
    results: movies.map((movie) => serializeMovieListItem(movie, favoritedIds.has(movie.id))),
    page,
    total_pages: totalPages,
    count: movies.length,
  }
}

// Every movie in a favorites list is favorited by definition
export function serializeFavorite(favorite: FavoriteRecord, movie: MovieWithGenres): FavoriteJson {
  return {
    id: favorite.id,
    movie: serializeMovieListItem(movie, true),
    created_at: favorite.created_at,
  }
}

export function serializeUser(user: UserRecord): UserJson {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    first_name: user.first_name,
    last_name: user.last_name,
  }
}
