import type { Request, Response, NextFunction, RequestHandler } from "express"
import { verifyAccessToken, type TokenUser } from "../lib/auth.js"
import type { AuthConfig } from "../lib/config.js"

// Extend Express Request type with the authenticated user
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: TokenUser
    }
  }
}

const BEARER_PREFIX = "Bearer "

function extractBearerToken(req: Request): string | null {
  const header = req.get("authorization")
  if (!header || !header.startsWith(BEARER_PREFIX)) {
    return null
  }
  const token = header.slice(BEARER_PREFIX.length).trim()
  return token.length > 0 ? token : null
}

export interface AuthMiddleware {
  /** Rejects the request with 401 unless it carries a valid access token. */
  requireAuth: RequestHandler
  /** Sets req.user when a valid token is present, never blocks. */
  optionalAuth: RequestHandler
}

export function createAuthMiddleware(config: AuthConfig): AuthMiddleware {
  function requireAuth(req: Request, res: Response, next: NextFunction): void {
    const token = extractBearerToken(req)
    if (!token) {
      res.status(401).json({ error: { message: "Authentication required" } })
      return
    }

    const user = verifyAccessToken(token, config)
    if (!user) {
      res.status(401).json({ error: { message: "Invalid authentication token" } })
      return
    }

    req.user = user
    next()
  }

  function optionalAuth(req: Request, _res: Response, next: NextFunction): void {
    const token = extractBearerToken(req)
    if (token) {
      const user = verifyAccessToken(token, config)
      if (user) {
        req.user = user
      }
    }
    next()
  }

  return { requireAuth, optionalAuth }
}
