/**
 * Server startup initialization.
 * Ensures the database schema is current before the server starts serving requests.
 */
import { runner } from "node-pg-migrate"
import { existsSync } from "fs"
import { join, dirname } from "path"
import { fileURLToPath } from "url"
import { logger } from "./logger.js"

const __dirname = dirname(fileURLToPath(import.meta.url))

/**
 * Find the migrations directory, handling both development and production paths.
 */
export function findMigrationsDir(): string {
  // In development: server/src/lib/startup.ts -> server/migrations
  // In production: server/dist/lib/startup.js -> server/migrations
  const possiblePaths = [
    join(__dirname, "..", "..", "migrations"),
    join(__dirname, "..", "..", "..", "migrations"),
  ]

  for (const path of possiblePaths) {
    if (existsSync(path)) {
      return path
    }
  }

  // Default to first path even if it doesn't exist (will error later with useful message)
  return possiblePaths[0]
}

/**
 * Run pending migrations using node-pg-migrate programmatically.
 */
export async function runMigrations(databaseUrl: string): Promise<void> {
  const migrationsDir = findMigrationsDir()
  logger.info({ migrationsDir }, "Running database migrations")

  await runner({
    databaseUrl,
    dir: migrationsDir,
    direction: "up",
    migrationsTable: "pgmigrations",
    log: (msg) => logger.debug(msg),
  })

  logger.info("Migrations complete")
}
