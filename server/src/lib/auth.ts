import bcrypt from "bcrypt"
import jwt from "jsonwebtoken"
import type { AuthConfig } from "./config.js"
import { logger } from "./logger.js"

const JWT_ALGORITHM = "HS256"

// Identity carried by a verified access token
export interface TokenUser {
  id: number
  username: string
}

/**
 * Hash a password using bcrypt
 */
export async function hashPassword(password: string, rounds: number): Promise<string> {
  return bcrypt.hash(password, rounds)
}

/**
 * Verify a password against a bcrypt hash
 */
export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash)
}

/**
 * Sign an access token whose subject is the user ID.
 */
export function generateAccessToken(user: TokenUser, config: AuthConfig): string {
  return jwt.sign({ username: user.username }, config.jwtSecret, {
    algorithm: JWT_ALGORITHM,
    subject: String(user.id),
    expiresIn: config.jwtExpiresInSeconds,
  })
}

/**
 * Verify an access token and extract the user it was issued to.
 * @returns The token's user, or null if the token is invalid or expired
 */
export function verifyAccessToken(token: string, config: AuthConfig): TokenUser | null {
  let decoded: string | jwt.JwtPayload
  try {
    decoded = jwt.verify(token, config.jwtSecret, { algorithms: [JWT_ALGORITHM] })
  } catch (error) {
    logger.debug({ error }, "Invalid access token")
    return null
  }

  if (typeof decoded === "string") return null

  const id = Number(decoded.sub)
  const username: unknown = decoded.username
  if (!Number.isInteger(id) || id < 1 || typeof username !== "string") {
    return null
  }

  return { id, username }
}
