import express, { type Express } from "express"
import cors from "cors"
import type { CatalogService } from "./lib/catalog-service.js"
import type { AuthConfig } from "./lib/config.js"
import type { Queryable } from "./lib/db/index.js"
import { createAuthMiddleware } from "./middleware/auth.js"
import { errorHandler } from "./middleware/error-handler.js"
import { requestLogging } from "./middleware/request-logging.js"
import { createAuthRouter } from "./routes/auth.js"
import { createMoviesRouter } from "./routes/movies.js"

export interface AppDeps {
  db: Queryable
  catalog: CatalogService
  authConfig: AuthConfig
}

/**
 * Build the Express app. Kept separate from index.ts so tests can drive it
 * with supertest against an in-process database.
 */
export function createApp({ db, catalog, authConfig }: AppDeps): Express {
  const app = express()
  const auth = createAuthMiddleware(authConfig)

  // Middleware
  app.use(cors())
  app.use(express.json())
  app.use(requestLogging)

  // Health check
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" })
  })

  // API routes
  app.use("/api/auth", createAuthRouter({ db, config: authConfig, auth }))
  app.use("/api/movies", createMoviesRouter({ db, catalog, auth }))

  app.use((_req, res) => {
    res.status(404).json({ error: { message: "Not found" } })
  })

  app.use(errorHandler)

  return app
}
