/**
 * Database module barrel file.
 *
 * Import pattern:
 *   import { upsertMovie, type MovieRecord } from "./db/index.js"
 */

export {
  createPool,
  closePool,
  withTransaction,
  type Database,
  type Queryable,
} from "./pool.js"

export {
  upsertMovie,
  getMovieByTmdbId,
  getMovieById,
  getMoviesByIds,
  replaceMovieGenres,
  getGenresForMovies,
  withGenres,
  getMoviesByGenre,
  countMoviesByGenre,
} from "./movies.js"

export { listGenres, getGenresByTmdbIds, findGenreByName, upsertGenres } from "./genres.js"

export { createUser, getUserById, getUserCredentials, findTakenIdentity } from "./users.js"

export {
  listFavorites,
  addFavorite,
  deleteFavorite,
  countFavorites,
  getFavoritedMovieIds,
} from "./favorites.js"

export type {
  MovieRecord,
  MovieInput,
  MovieWithGenres,
  GenreRecord,
  GenreInput,
  UserRecord,
  UserCredentialsRecord,
  UserInput,
  FavoriteRecord,
  FavoriteWithMovie,
  MoviesByGenreOptions,
} from "./types.js"
