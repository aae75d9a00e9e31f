import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from "vitest"
import type { Express } from "express"
import type { PGlite } from "@electric-sql/pglite"
import request from "supertest"

vi.mock("../lib/logger.js", () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
  createRouteLogger: vi.fn(() => ({ error: vi.fn() })),
}))

import { createApp } from "../app.js"
import { generateAccessToken } from "../lib/auth.js"
import { MemoryResponseCache } from "../lib/cache.js"
import { CatalogService } from "../lib/catalog-service.js"
import { loadConfig } from "../lib/config.js"
import { createUser } from "../lib/db/users.js"
import {
  closeTestDb,
  getTestDb,
  insertGenre,
  insertMovie,
  linkMovieGenre,
  resetTestDb,
} from "../test/pglite-helper.js"
import {
  TEST_GENRES,
  createFakeProvider,
  listPage,
  listRecord,
  type FakeProvider,
} from "../test/fake-provider.js"

const config = loadConfig({
  DATABASE_URL: "postgres://localhost:5432/reel_test",
  TMDB_API_TOKEN: "test-token",
  JWT_SECRET: "test-secret",
  BCRYPT_ROUNDS: "4",
})

let db: PGlite

beforeAll(async () => {
  db = await getTestDb()
})

afterAll(async () => {
  await closeTestDb()
})

describe("movies routes", () => {
  let provider: FakeProvider
  let cache: MemoryResponseCache
  let app: Express

  beforeEach(async () => {
    await resetTestDb()
    vi.clearAllMocks()
    provider = createFakeProvider()
    provider.getGenres.mockResolvedValue(TEST_GENRES)
    cache = new MemoryResponseCache()
    const catalog = new CatalogService({ db, provider, cache, cacheTtl: config.cacheTtl })
    app = createApp({ db, catalog, authConfig: config.auth })
  })

  afterEach(() => {
    cache.destroy()
  })

  async function loginAs(username: string): Promise<{ userId: number; authHeader: string }> {
    const user = await createUser(db, {
      username,
      email: `${username}@example.com`,
      first_name: "",
      last_name: "",
      password_hash: "not-a-real-hash",
    })
    const token = generateAccessToken({ id: user.id, username }, config.auth)
    return { userId: user.id, authHeader: `Bearer ${token}` }
  }

  describe("GET /health", () => {
    it("reports ok", async () => {
      const res = await request(app).get("/health")

      expect(res.status).toBe(200)
      expect(res.body).toEqual({ status: "ok" })
    })
  })

  describe("GET /api/movies/genres", () => {
    it("lists genres ordered by name", async () => {
      const res = await request(app).get("/api/movies/genres")

      expect(res.status).toBe(200)
      expect(res.body).toEqual([
        { id: 1, name: "Action", tmdb_id: 28 },
        { id: 2, name: "Comedy", tmdb_id: 35 },
        { id: 3, name: "Drama", tmdb_id: 18 },
        { id: 4, name: "Science Fiction", tmdb_id: 878 },
      ])
    })
  })

  describe("GET /api/movies/popular", () => {
    it("returns the list envelope", async () => {
      provider.getPopular.mockResolvedValue(listPage([listRecord(550)], 3))

      const res = await request(app).get("/api/movies/popular")

      expect(res.status).toBe(200)
      expect(res.body).toEqual({
        results: [
          {
            id: 1,
            tmdb_id: 550,
            title: "Movie 550",
            release_date: "2020-01-01",
            vote_average: 7,
            popularity: 10,
            poster_url: "https://image.tmdb.org/t/p/w500/poster-550.jpg",
            genres: ["Action"],
            is_favorited: false,
          },
        ],
        page: 1,
        total_pages: 3,
        count: 1,
      })
      expect(provider.getPopular).toHaveBeenCalledWith(1)
    })

    it("passes the page through", async () => {
      provider.getPopular.mockResolvedValue(listPage([], 3, 2))

      const res = await request(app).get("/api/movies/popular?page=2")

      expect(res.body.page).toBe(2)
      expect(provider.getPopular).toHaveBeenCalledWith(2)
    })

    it("rejects an invalid page", async () => {
      const res = await request(app).get("/api/movies/popular?page=0")

      expect(res.status).toBe(400)
      expect(res.body).toEqual({ error: { message: "page must be a positive integer" } })
    })

    it("returns an empty envelope when the provider is down", async () => {
      provider.getPopular.mockResolvedValue(null)

      const res = await request(app).get("/api/movies/popular")

      expect(res.status).toBe(200)
      expect(res.body).toEqual({ results: [], page: 1, total_pages: 0, count: 0 })
    })

    it("marks favorited movies for an authenticated caller", async () => {
      provider.getPopular.mockResolvedValue(listPage([listRecord(1), listRecord(2)], 1))
      const { authHeader } = await loginAs("moviefan")
      await request(app).get("/api/movies/popular")
      await request(app)
        .post("/api/movies/favorites")
        .set("Authorization", authHeader)
        .send({ movie_id: 2 })

      const res = await request(app).get("/api/movies/popular").set("Authorization", authHeader)
      const anonymous = await request(app).get("/api/movies/popular")

      expect(res.body.results.map((item: { is_favorited: boolean }) => item.is_favorited)).toEqual([
        false,
        true,
      ])
      expect(
        anonymous.body.results.map((item: { is_favorited: boolean }) => item.is_favorited)
      ).toEqual([false, false])
    })
  })

  describe("GET /api/movies/trending", () => {
    it("defaults to the day window", async () => {
      provider.getTrending.mockResolvedValue(listPage([listRecord(7)], 1))

      const res = await request(app).get("/api/movies/trending")

      expect(res.status).toBe(200)
      expect(res.body.count).toBe(1)
      expect(provider.getTrending).toHaveBeenCalledWith("day", 1)
    })

    it("accepts the week window", async () => {
      provider.getTrending.mockResolvedValue(listPage([], 1))

      await request(app).get("/api/movies/trending?time_window=week&page=3")

      expect(provider.getTrending).toHaveBeenCalledWith("week", 3)
    })

    it("rejects an unknown window", async () => {
      const res = await request(app).get("/api/movies/trending?time_window=month")

      expect(res.status).toBe(400)
      expect(res.body).toEqual({ error: { message: 'time_window must be "day" or "week"' } })
      expect(provider.getTrending).not.toHaveBeenCalled()
    })
  })

  describe("GET /api/movies/search", () => {
    it("requires a query", async () => {
      const missing = await request(app).get("/api/movies/search")
      const blank = await request(app).get("/api/movies/search?q=%20%20")

      expect(missing.status).toBe(400)
      expect(missing.body).toEqual({ error: { message: "Search query is required" } })
      expect(blank.status).toBe(400)
      expect(provider.searchMovies).not.toHaveBeenCalled()
    })

    it("echoes the trimmed query", async () => {
      provider.searchMovies.mockResolvedValue(listPage([listRecord(11, { title: "Space Saga" })], 1))

      const res = await request(app).get("/api/movies/search?q=%20Space%20Saga%20")

      expect(res.status).toBe(200)
      expect(res.body.query).toBe("Space Saga")
      expect(res.body.results[0].title).toBe("Space Saga")
      expect(provider.searchMovies).toHaveBeenCalledWith("Space Saga", 1)
    })
  })

  describe("GET /api/movies/genre", () => {
    it("lists local movies in the genre", async () => {
      const genreId = await insertGenre(db, { tmdb_id: 28, name: "Action" })
      const movieId = await insertMovie(db, { tmdb_id: 100, title: "Local Action", popularity: 5 })
      await linkMovieGenre(db, movieId, genreId)

      const res = await request(app).get("/api/movies/genre?genre=action")

      expect(res.status).toBe(200)
      expect(res.body).toMatchObject({
        page: 1,
        total_pages: 1,
        count: 1,
        genre: "action",
      })
      expect(res.body.results[0]).toMatchObject({ title: "Local Action", genres: ["Action"] })
    })

    it("returns 404 for an unknown genre", async () => {
      const res = await request(app).get("/api/movies/genre?genre=Western")

      expect(res.status).toBe(404)
      expect(res.body).toEqual({ error: { message: 'Genre "Western" not found' } })
    })

    it("requires the genre parameter", async () => {
      const res = await request(app).get("/api/movies/genre")

      expect(res.status).toBe(400)
      expect(res.body).toEqual({ error: { message: "Genre parameter is required" } })
    })
  })

  describe("GET /api/movies/:tmdbId", () => {
    it("returns the full movie detail", async () => {
      provider.getMovieDetails.mockResolvedValue({
        id: 603,
        title: "Detail Movie",
        overview: "Overview text",
        release_date: "1999-03-31",
        vote_average: 8.2,
        popularity: 70.5,
        poster_path: "/p.jpg",
        backdrop_path: "/b.jpg",
        genres: [{ id: 878, name: "Science Fiction" }],
      })

      const res = await request(app).get("/api/movies/603")

      expect(res.status).toBe(200)
      expect(res.body).toMatchObject({
        id: 1,
        tmdb_id: 603,
        title: "Detail Movie",
        overview: "Overview text",
        release_date: "1999-03-31",
        vote_average: 8.2,
        popularity: 70.5,
        poster_path: "/p.jpg",
        backdrop_path: "/b.jpg",
        poster_url: "https://image.tmdb.org/t/p/w500/p.jpg",
        backdrop_url: "https://image.tmdb.org/t/p/w1280/b.jpg",
        genres: [{ id: 1, name: "Science Fiction", tmdb_id: 878 }],
        is_favorited: false,
      })
      expect(typeof res.body.created_at).toBe("string")
    })

    it("returns null image URLs when paths are missing", async () => {
      await insertMovie(db, { tmdb_id: 42, title: "No Art" })

      const res = await request(app).get("/api/movies/42")

      expect(res.body.poster_url).toBeNull()
      expect(res.body.backdrop_url).toBeNull()
    })

    it("returns 404 when the movie cannot be found", async () => {
      const res = await request(app).get("/api/movies/999999")

      expect(res.status).toBe(404)
      expect(res.body).toEqual({ error: { message: "Movie not found" } })
    })

    it("returns 404 for a non-numeric ID", async () => {
      const res = await request(app).get("/api/movies/abc")

      expect(res.status).toBe(404)
      expect(provider.getMovieDetails).not.toHaveBeenCalled()
    })
  })

  describe("favorites", () => {
    it("requires authentication", async () => {
      const list = await request(app).get("/api/movies/favorites")
      const add = await request(app).post("/api/movies/favorites").send({ movie_id: 1 })

      expect(list.status).toBe(401)
      expect(add.status).toBe(401)
    })

    it("adds, lists and removes a favorite", async () => {
      const { authHeader } = await loginAs("moviefan")
      const movieId = await insertMovie(db, {
        tmdb_id: 550,
        title: "Favorite Movie",
        release_date: "1999-10-15",
      })

      const added = await request(app)
        .post("/api/movies/favorites")
        .set("Authorization", authHeader)
        .send({ movie_id: movieId })

      expect(added.status).toBe(201)
      expect(added.body).toMatchObject({
        id: 1,
        movie: {
          id: movieId,
          tmdb_id: 550,
          title: "Favorite Movie",
          release_date: "1999-10-15",
          is_favorited: true,
        },
      })

      const list = await request(app).get("/api/movies/favorites").set("Authorization", authHeader)
      expect(list.status).toBe(200)
      expect(list.body).toHaveLength(1)
      expect(list.body[0].movie.title).toBe("Favorite Movie")

      const removed = await request(app)
        .delete(`/api/movies/favorites/${added.body.id}`)
        .set("Authorization", authHeader)
      expect(removed.status).toBe(204)

      const after = await request(app).get("/api/movies/favorites").set("Authorization", authHeader)
      expect(after.body).toEqual([])
    })

    it("rejects a duplicate favorite", async () => {
      const { authHeader } = await loginAs("moviefan")
      const movieId = await insertMovie(db, { tmdb_id: 550, title: "Twice" })

      await request(app)
        .post("/api/movies/favorites")
        .set("Authorization", authHeader)
        .send({ movie_id: movieId })
      const res = await request(app)
        .post("/api/movies/favorites")
        .set("Authorization", authHeader)
        .send({ movie_id: movieId })

      expect(res.status).toBe(400)
      expect(res.body).toEqual({ error: { message: "Movie is already in favorites." } })
    })

    it("rejects an unknown movie", async () => {
      const { authHeader } = await loginAs("moviefan")

      const res = await request(app)
        .post("/api/movies/favorites")
        .set("Authorization", authHeader)
        .send({ movie_id: 12345 })

      expect(res.status).toBe(400)
      expect(res.body).toEqual({ error: { message: "Movie does not exist." } })
    })

    it("rejects a missing movie_id", async () => {
      const { authHeader } = await loginAs("moviefan")

      const res = await request(app)
        .post("/api/movies/favorites")
        .set("Authorization", authHeader)
        .send({})

      expect(res.status).toBe(400)
    })

    it("returns 404 when deleting another user's favorite", async () => {
      const owner = await loginAs("owner")
      const other = await loginAs("intruder")
      const movieId = await insertMovie(db, { tmdb_id: 550, title: "Owned" })
      const added = await request(app)
        .post("/api/movies/favorites")
        .set("Authorization", owner.authHeader)
        .send({ movie_id: movieId })

      const res = await request(app)
        .delete(`/api/movies/favorites/${added.body.id}`)
        .set("Authorization", other.authHeader)

      expect(res.status).toBe(404)
      expect(res.body).toEqual({ error: { message: "Favorite not found" } })
    })
  })

  describe("GET /api/movies/profile", () => {
    it("returns the user with a favorites count", async () => {
      const { userId, authHeader } = await loginAs("moviefan")
      const movieId = await insertMovie(db, { tmdb_id: 550, title: "Counted" })
      await request(app)
        .post("/api/movies/favorites")
        .set("Authorization", authHeader)
        .send({ movie_id: movieId })

      const res = await request(app).get("/api/movies/profile").set("Authorization", authHeader)

      expect(res.status).toBe(200)
      expect(res.body).toEqual({
        id: userId,
        username: "moviefan",
        email: "moviefan@example.com",
        first_name: "",
        last_name: "",
        favorites_count: 1,
      })
    })
  })
})
