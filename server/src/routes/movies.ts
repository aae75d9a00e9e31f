/**
 * Movie catalog and favorites endpoints, mounted at /api/movies.
 */

import { Router, type NextFunction, type Request, type Response } from "express"
import { z } from "zod"
import type { CatalogService, MoviePage } from "../lib/catalog-service.js"
import {
  addFavorite,
  countFavorites,
  deleteFavorite,
  getFavoritedMovieIds,
  getMovieById,
  getUserById,
  listFavorites,
  withGenres,
  type Queryable,
} from "../lib/db/index.js"
import { NotFoundError, ValidationError, validationErrorFromIssues } from "../lib/errors.js"
import { parsePageParam } from "../lib/pagination.js"
import type { AuthMiddleware } from "../middleware/auth.js"
import {
  serializeFavorite,
  serializeGenre,
  serializeMovieDetail,
  serializeMoviePage,
  serializeUser,
} from "./serializers.js"

export interface MoviesRouterDeps {
  db: Queryable
  catalog: CatalogService
  auth: AuthMiddleware
}

const AddFavoriteSchema = z.object({
  movie_id: z.coerce
    .number({ invalid_type_error: "movie_id must be a number" })
    .int()
    .positive(),
})

function queryString(value: unknown): string {
  return typeof value === "string" ? value : ""
}

function parseIdParam(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) return null
  const id = parseInt(value, 10)
  return Number.isSafeInteger(id) ? id : null
}

export function createMoviesRouter({ db, catalog, auth }: MoviesRouterDeps): Router {
  const router = Router()

  // Local IDs among `movieIds` that the caller has favorited
  async function favoritedIdsFor(req: Request, movieIds: number[]): Promise<Set<number>> {
    if (!req.user) return new Set()
    return getFavoritedMovieIds(db, req.user.id, movieIds)
  }

  async function sendMoviePage(
    req: Request,
    res: Response,
    page: number,
    result: MoviePage,
    extra: Record<string, string> = {}
  ): Promise<void> {
    const favorited = await favoritedIdsFor(
      req,
      result.movies.map((movie) => movie.id)
    )
    res.json({
      ...serializeMoviePage(result.movies, page, result.totalPages, favorited),
      ...extra,
    })
  }

  // ==========================================================================
  // Catalog
  // ==========================================================================

  router.get("/genres", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const genres = await catalog.listGenres()
      res.json(genres.map(serializeGenre))
    } catch (error) {
      next(error)
    }
  })

  router.get(
    "/trending",
    auth.optionalAuth,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const timeWindow = queryString(req.query.time_window) || "day"
        const page = parsePageParam(req.query.page)
        const result = await catalog.getTrending(timeWindow, page)
        await sendMoviePage(req, res, page, result)
      } catch (error) {
        next(error)
      }
    }
  )

  router.get("/popular", auth.optionalAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const page = parsePageParam(req.query.page)
      const result = await catalog.getPopular(page)
      await sendMoviePage(req, res, page, result)
    } catch (error) {
      next(error)
    }
  })

  router.get("/search", auth.optionalAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = queryString(req.query.q).trim()
      if (!query) {
        throw new ValidationError("Search query is required")
      }
      const page = parsePageParam(req.query.page)
      const result = await catalog.searchMovies(query, page)
      await sendMoviePage(req, res, page, result, { query })
    } catch (error) {
      next(error)
    }
  })

  router.get("/genre", auth.optionalAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const genreName = queryString(req.query.genre).trim()
      if (!genreName) {
        throw new ValidationError("Genre parameter is required")
      }
      const page = parsePageParam(req.query.page)
      const result = await catalog.getMoviesByGenre(genreName, page)
      await sendMoviePage(req, res, page, result, { genre: genreName })
    } catch (error) {
      next(error)
    }
  })

  // ==========================================================================
  // Favorites and profile (registered before /:tmdbId)
  // ==========================================================================

  router.get("/favorites", auth.requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.user) throw new NotFoundError("User not found")
      const favorites = await listFavorites(db, req.user.id)
      res.json(favorites.map((favorite) => serializeFavorite(favorite, favorite.movie)))
    } catch (error) {
      next(error)
    }
  })

  router.post("/favorites", auth.requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.user) throw new NotFoundError("User not found")

      const parsed = AddFavoriteSchema.safeParse(req.body)
      if (!parsed.success) {
        throw validationErrorFromIssues(parsed.error.issues)
      }

      const movie = await getMovieById(db, parsed.data.movie_id)
      if (!movie) {
        throw new ValidationError("Movie does not exist.")
      }

      const favorite = await addFavorite(db, req.user.id, movie.id)
      if (!favorite) {
        throw new ValidationError("Movie is already in favorites.")
      }

      const [movieWithGenres] = await withGenres(db, [movie])
      res.status(201).json(serializeFavorite(favorite, movieWithGenres))
    } catch (error) {
      next(error)
    }
  })

  router.delete(
    "/favorites/:id",
    auth.requireAuth,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        if (!req.user) throw new NotFoundError("User not found")

        const favoriteId = parseIdParam(req.params.id)
        const deleted = favoriteId !== null && (await deleteFavorite(db, req.user.id, favoriteId))
        if (!deleted) {
          throw new NotFoundError("Favorite not found")
        }
        res.status(204).end()
      } catch (error) {
        next(error)
      }
    }
  )

  router.get("/profile", auth.requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = req.user ? await getUserById(db, req.user.id) : null
      if (!user) {
        throw new NotFoundError("User not found")
      }
      res.json({
        ...serializeUser(user),
        favorites_count: await countFavorites(db, user.id),
      })
    } catch (error) {
      next(error)
    }
  })

  // ==========================================================================
  // Details
  // ==========================================================================

  router.get("/:tmdbId", auth.optionalAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const tmdbId = parseIdParam(req.params.tmdbId)
      if (tmdbId === null) {
        throw new NotFoundError("Movie not found")
      }

      const movie = await catalog.getMovieDetails(tmdbId)
      const favorited = await favoritedIdsFor(req, [movie.id])
      res.json(serializeMovieDetail(movie, favorited.has(movie.id)))
    } catch (error) {
      next(error)
    }
  })

  return router
}
