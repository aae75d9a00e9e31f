import { pino } from "pino"
import type { Request } from "express"

const nodeEnv = process.env.NODE_ENV || "development"
const isProduction = nodeEnv === "production"
const isTest = nodeEnv === "test"

/**
 * Structured logger shared by the server and scripts.
 * JSON output in production and tests, pino-pretty during development.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || (isProduction ? "info" : "debug"),
  transport:
    isProduction || isTest
      ? undefined
      : {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
  base: {
    service: "reel-catalog",
    env: nodeEnv,
  },
  redact: {
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "password",
      "password_hash",
      "apiToken",
      "token",
    ],
    censor: "[REDACTED]",
  },
})

/**
 * Child logger for an Express request, keyed by the x-request-id header when present.
 */
export function createRouteLogger(req: Request) {
  const requestId = req.get("x-request-id") || "unknown"
  return logger.child({
    requestId,
    path: req.path,
    method: req.method,
  })
}
