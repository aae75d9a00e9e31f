/**
 * Application configuration.
 *
 * The environment is parsed once at startup and the resulting struct is passed
 * to the components that need it. Nothing under lib/ reads process.env for
 * runtime settings.
 */

import { z } from "zod"

// Treat empty assignments in .env files (FOO=) as unset
const blankAsUndefined = (value: unknown) => (value === "" ? undefined : value)

const optionalString = z.preprocess(blankAsUndefined, z.string().optional())

function positiveInt(defaultValue: number) {
  return z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(defaultValue))
}

const EnvSchema = z.object({
  NODE_ENV: z.preprocess(blankAsUndefined, z.string().default("development")),
  PORT: positiveInt(8080),
  DATABASE_URL: z.string({ required_error: "DATABASE_URL is required" }).min(1),
  TMDB_API_TOKEN: z.string({ required_error: "TMDB_API_TOKEN is required" }).min(1),
  TMDB_BASE_URL: z.preprocess(
    blankAsUndefined,
    z.string().url().default("https://api.themoviedb.org/3")
  ),
  TMDB_TIMEOUT_MS: positiveInt(10_000),
  REDIS_URL: optionalString,
  CACHE_TTL_GENRES: positiveInt(60 * 60 * 24 * 7),
  CACHE_TTL_TRENDING: positiveInt(60 * 60),
  CACHE_TTL_POPULAR: positiveInt(60 * 60),
  CACHE_TTL_DETAILS: positiveInt(60 * 60 * 24),
  JWT_SECRET: z.string({ required_error: "JWT_SECRET is required" }).min(1),
  JWT_EXPIRES_IN_SECONDS: positiveInt(60 * 60 * 24),
  BCRYPT_ROUNDS: z.preprocess(blankAsUndefined, z.coerce.number().int().min(4).max(15).default(10)),
})

export interface TmdbClientConfig {
  baseUrl: string
  apiToken: string
  timeoutMs: number
}

/** TTLs in seconds per cached response category. */
export interface CacheTtlConfig {
  genres: number
  trending: number
  popular: number
  details: number
}

export interface AuthConfig {
  jwtSecret: string
  jwtExpiresInSeconds: number
  bcryptRounds: number
}

export interface AppConfig {
  env: string
  port: number
  databaseUrl: string
  redisUrl: string | undefined
  tmdb: TmdbClientConfig
  cacheTtl: CacheTtlConfig
  auth: AuthConfig
}

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`)
    this.name = "ConfigError"
    this.issues = issues
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    )
  }

  const vars = parsed.data
  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    redisUrl: vars.REDIS_URL,
    tmdb: {
      baseUrl: vars.TMDB_BASE_URL.replace(/\/+$/, ""),
      apiToken: vars.TMDB_API_TOKEN,
      timeoutMs: vars.TMDB_TIMEOUT_MS,
    },
    cacheTtl: {
      genres: vars.CACHE_TTL_GENRES,
      trending: vars.CACHE_TTL_TRENDING,
      popular: vars.CACHE_TTL_POPULAR,
      details: vars.CACHE_TTL_DETAILS,
    },
    auth: {
      jwtSecret: vars.JWT_SECRET,
      jwtExpiresInSeconds: vars.JWT_EXPIRES_IN_SECONDS,
      bcryptRounds: vars.BCRYPT_ROUNDS,
    },
  }
}
