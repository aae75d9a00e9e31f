/**
 * User account database functions.
 */

import type { Queryable } from "./pool.js"
import type { UserCredentialsRecord, UserInput, UserRecord } from "./types.js"

const USER_COLUMNS = "id, username, email, first_name, last_name, created_at"

export async function createUser(db: Queryable, user: UserInput): Promise<UserRecord> {
  const result = await db.query<UserRecord>(
    `INSERT INTO users (username, email, first_name, last_name, password_hash)
     VALUES ($1, $2, $3, $4, $5)
     RETURNING ${USER_COLUMNS}`,
    [user.username, user.email, user.first_name, user.last_name, user.password_hash]
  )
  return result.rows[0]
}

export async function getUserById(db: Queryable, id: number): Promise<UserRecord | null> {
  const result = await db.query<UserRecord>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id])
  return result.rows[0] || null
}

// Includes the password hash - only for login
export async function getUserCredentials(
  db: Queryable,
  username: string
): Promise<UserCredentialsRecord | null> {
  const result = await db.query<UserCredentialsRecord>(
    `SELECT ${USER_COLUMNS}, password_hash FROM users WHERE username = $1`,
    [username]
  )
  return result.rows[0] || null
}

/**
 * Which of the username/email pair is already registered.
 */
export async function findTakenIdentity(
  db: Queryable,
  username: string,
  email: string
): Promise<{ username: boolean; email: boolean }> {
  const result = await db.query<{ username: string; email: string }>(
    "SELECT username, email FROM users WHERE username = $1 OR LOWER(email) = LOWER($2)",
    [username, email]
  )
  return {
    username: result.rows.some((row) => row.username === username),
    email: result.rows.some((row) => row.email.toLowerCase() === email.toLowerCase()),
  }
}
