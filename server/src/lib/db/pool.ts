/**
 * Database connection pool management.
 */

import pg from "pg"
import type { QueryResultRow } from "pg"
import { logger } from "../logger.js"

const { Pool } = pg

/**
 * Anything that runs a parameterized query and hands back rows.
 * Satisfied by pg.Pool, pg.PoolClient and PGlite, so repository functions
 * run unchanged against the in-process test database.
 */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: T[] }>
}

/**
 * A pg.Pool: hands out dedicated clients for multi-statement transactions.
 */
interface ClientPool extends Queryable {
  connect(): Promise<Queryable & { release(): void }>
}

/**
 * A single-connection database that runs its own transactions (PGlite).
 */
interface TransactionRunner extends Queryable {
  transaction<T>(callback: (tx: Queryable) => Promise<T>): Promise<T>
}

// Anything repository code can open a transaction on
export type Database = ClientPool | TransactionRunner

/**
 * Creates a new database pool with connection recovery settings.
 * Idle clients are closed after 30 seconds and connection attempts fail
 * after 10 seconds; pool-level errors are logged instead of crashing the
 * process, and the pool replaces broken clients on the next checkout.
 */
export function createPool(connectionString: string): pg.Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  })

  pool.on("error", (err: Error) => {
    logger.error({ err: err.message }, "Unexpected database pool error")
  })

  return pool
}

/**
 * Close the pool, logging rather than throwing if shutdown fails.
 */
export async function closePool(pool: pg.Pool): Promise<void> {
  try {
    await pool.end()
  } catch (err) {
    logger.error({ err }, "Error closing database pool")
  }
}

/**
 * Build a `$1, $2, ...` placeholder list starting at the given index.
 */
export function placeholders(count: number, startAt = 1): string {
  return Array.from({ length: count }, (_, i) => `$${i + startAt}`).join(", ")
}

/**
 * Check for a PostgreSQL unique_violation (SQLSTATE 23505).
 */
export function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "23505"
}

/**
 * Run `fn` inside one transaction. Commits when it resolves, rolls back and
 * rethrows when it rejects.
 */
export async function withTransaction<T>(
  db: Database,
  fn: (tx: Queryable) => Promise<T>
): Promise<T> {
  if ("transaction" in db) {
    return db.transaction(fn)
  }

  const client = await db.connect()
  try {
    await client.query("BEGIN")
    const result = await fn(client)
    await client.query("COMMIT")
    return result
  } catch (error) {
    await client.query("ROLLBACK")
    throw error
  } finally {
    client.release()
  }
}
