/**
 * Account endpoints, mounted at /api/auth.
 */

import { Router, type NextFunction, type Request, type Response } from "express"
import { z } from "zod"
import { generateAccessToken, hashPassword, verifyPassword } from "../lib/auth.js"
import type { AuthConfig } from "../lib/config.js"
import {
  createUser,
  findTakenIdentity,
  getUserById,
  getUserCredentials,
  type Queryable,
  type UserRecord,
} from "../lib/db/index.js"
import { isUniqueViolation } from "../lib/db/pool.js"
import {
  AuthenticationError,
  NotFoundError,
  ValidationError,
  validationErrorFromIssues,
} from "../lib/errors.js"
import { logger } from "../lib/logger.js"
import type { AuthMiddleware } from "../middleware/auth.js"
import { serializeUser } from "./serializers.js"

export interface AuthRouterDeps {
  db: Queryable
  config: AuthConfig
  auth: AuthMiddleware
}

const RegisterSchema = z.object({
  username: z
    .string()
    .trim()
    .min(3, "Username must be at least 3 characters")
    .max(150, "Username must be at most 150 characters")
    .regex(/^[\w.@+-]+$/, "Username may only contain letters, digits and @/./+/-/_"),
  email: z.string().trim().email("Enter a valid email address"),
  password: z.string().min(8, "Password must be at least 8 characters"),
  first_name: z.string().trim().max(150).default(""),
  last_name: z.string().trim().max(150).default(""),
})

const LoginSchema = z.object({
  username: z.string().trim().min(1, "Username is required"),
  password: z.string().min(1, "Password is required"),
})

export function createAuthRouter({ db, config, auth }: AuthRouterDeps): Router {
  const router = Router()

  function tokenResponse(message: string, user: UserRecord) {
    return {
      message,
      user: serializeUser(user),
      tokens: {
        access: generateAccessToken({ id: user.id, username: user.username }, config),
      },
    }
  }

  // POST /api/auth/register
  router.post("/register", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = RegisterSchema.safeParse(req.body)
      if (!parsed.success) {
        throw validationErrorFromIssues(parsed.error.issues)
      }
      const { username, email, password, first_name, last_name } = parsed.data

      const taken = await findTakenIdentity(db, username, email)
      if (taken.username) {
        throw new ValidationError("A user with that username already exists.")
      }
      if (taken.email) {
        throw new ValidationError("A user with that email already exists.")
      }

      let user: UserRecord
      try {
        user = await createUser(db, {
          username,
          email,
          first_name,
          last_name,
          password_hash: await hashPassword(password, config.bcryptRounds),
        })
      } catch (error) {
        // Lost a race with a concurrent registration
        if (isUniqueViolation(error)) {
          throw new ValidationError("A user with that username or email already exists.")
        }
        throw error
      }

      logger.info({ userId: user.id }, "User registered")
      res.status(201).json(tokenResponse("User registered successfully", user))
    } catch (error) {
      next(error)
    }
  })

  // POST /api/auth/login
  router.post("/login", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = LoginSchema.safeParse(req.body)
      if (!parsed.success) {
        throw validationErrorFromIssues(parsed.error.issues)
      }

      const credentials = await getUserCredentials(db, parsed.data.username)
      const isValid =
        credentials !== null && (await verifyPassword(parsed.data.password, credentials.password_hash))
      if (!credentials || !isValid) {
        logger.warn({ ip: req.ip }, "Login failed: invalid credentials")
        throw new AuthenticationError("Invalid credentials")
      }

      const { password_hash: _passwordHash, ...user } = credentials
      res.json(tokenResponse("Login successful", user))
    } catch (error) {
      next(error)
    }
  })

  // GET /api/auth/status
  router.get("/status", auth.requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = req.user ? await getUserById(db, req.user.id) : null
      if (!user) {
        throw new NotFoundError("User not found")
      }
      res.json({ authenticated: true, user: serializeUser(user) })
    } catch (error) {
      next(error)
    }
  })

  return router
}
